import type { BridgeResponse, CommandSender, JsonObject } from "@blender-bridge/transport";

export interface SentCommand {
  type: string;
  params: JsonObject;
}

type Reply = (type: string, params: JsonObject) => BridgeResponse | Promise<BridgeResponse>;

/** Stands in for the socket dispatcher and records what tools forward. */
export class RecordingSender implements CommandSender {
  readonly sent: SentCommand[] = [];

  constructor(private readonly reply: Reply = () => ({ status: "success", result: {} })) {}

  async send(type: string, params: JsonObject = {}): Promise<BridgeResponse> {
    this.sent.push({ type, params });
    return this.reply(type, params);
  }
}
