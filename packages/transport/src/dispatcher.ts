import type { Channel } from "./channel.js";
import { jsonCodec, type DocumentCodec } from "./codec.js";
import { DEFAULT_CONNECTION_CONFIG, type ConnectionConfig } from "./config.js";
import { ConnectionManager } from "./connectionManager.js";
import { TransportError, asTransportError, invalidatesConnection } from "./errors.js";
import { createSpeculativeFrameReader, type FrameReader } from "./frameReader.js";
import { DispatchLock } from "./lock.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import {
  BridgeCommandSchema,
  BridgeResponseSchema,
  type BridgeCommand,
  type BridgeResponse,
  type JsonObject,
} from "./protocol.js";

/** What tool handlers depend on; lets them be tested without a socket. */
export interface CommandSender {
  send(commandType: string, params?: JsonObject): Promise<BridgeResponse>;
}

export interface CommandDispatcherOptions {
  connections?: ConnectionManager;
  frameReader?: FrameReader;
  codec?: DocumentCodec;
  timeoutMs?: number;
  healthCheckCommand?: string | null;
  logger?: Logger;
}

function preview(value: unknown, limit = 200): string {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}

/**
 * Sends one command at a time to Blender and waits for exactly one response.
 *
 * Every call runs under a FIFO lock, so concurrent callers are served in call
 * order. A call that fails at the transport level releases the connection;
 * the next call reconnects. Host-side errors come back as ordinary responses
 * with `status: "error"` and are not interpreted here.
 */
export class CommandDispatcher implements CommandSender {
  readonly connections: ConnectionManager;
  private readonly frameReader: FrameReader;
  private readonly codec: DocumentCodec;
  private readonly timeoutMs: number;
  private readonly healthCheckCommand: string | null;
  private readonly lock = new DispatchLock();
  private readonly log: Logger;

  constructor(options: CommandDispatcherOptions = {}) {
    this.log = options.logger ?? rootLogger.child({ module: "dispatcher" });
    this.codec = options.codec ?? jsonCodec;
    this.connections = options.connections ?? new ConnectionManager();
    this.frameReader = options.frameReader ?? createSpeculativeFrameReader({ codec: this.codec });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONNECTION_CONFIG.timeoutMs;
    this.healthCheckCommand =
      options.healthCheckCommand === undefined ? DEFAULT_CONNECTION_CONFIG.healthCheckCommand : options.healthCheckCommand;
  }

  static fromConfig(config: ConnectionConfig, logger: Logger = rootLogger): CommandDispatcher {
    const codec = jsonCodec;
    return new CommandDispatcher({
      connections: new ConnectionManager({
        address: { host: config.host, port: config.port },
        connectTimeoutMs: config.connectTimeoutMs,
        logger: logger.child({ module: "connection" }),
      }),
      codec,
      frameReader: createSpeculativeFrameReader({
        codec,
        chunkSize: config.chunkSize,
        logger: logger.child({ module: "frame-reader" }),
      }),
      timeoutMs: config.timeoutMs,
      healthCheckCommand: config.healthCheckCommand,
      logger: logger.child({ module: "dispatcher" }),
    });
  }

  async send(commandType: string, params: JsonObject = {}): Promise<BridgeResponse> {
    const { command, bytes } = this.prepare(commandType, params);
    return this.lock.runExclusive(async () => {
      const channel = await this.connections.acquire(this.healthCheckCommand ? this.probe : undefined);
      try {
        return await this.exchange(channel, command, bytes);
      } catch (error) {
        const failure = asTransportError(error, "CONNECTION_FAILURE", "Communication error with Blender");
        if (invalidatesConnection(failure)) {
          this.connections.release();
        }
        this.log.error({ err: failure, command: command.type }, "command failed");
        throw failure;
      }
    });
  }

  /** Opens (or re-checks) the connection without sending a command of its own. */
  async connect(): Promise<void> {
    await this.lock.runExclusive(() => this.connections.acquire(this.healthCheckCommand ? this.probe : undefined));
  }

  /** Shutdown hook; waits for an in-flight command before closing. */
  close(): Promise<void> {
    return this.lock.runExclusive(async () => {
      this.connections.release();
    });
  }

  private readonly probe = async (channel: Channel): Promise<void> => {
    if (!this.healthCheckCommand) return;
    const command: BridgeCommand = { type: this.healthCheckCommand, params: {} };
    await this.exchange(channel, command, this.codec.encode(command));
  };

  private prepare(commandType: string, params: JsonObject): { command: BridgeCommand; bytes: Buffer } {
    const parsed = BridgeCommandSchema.safeParse({ type: commandType, params });
    if (!parsed.success) {
      throw new TransportError(
        "INVALID_COMMAND",
        `Invalid command "${commandType}": ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      );
    }
    const command: BridgeCommand = parsed.data;
    try {
      return { command, bytes: this.codec.encode(command) };
    } catch (error) {
      throw asTransportError(error, "INVALID_COMMAND", `Could not encode command "${commandType}"`);
    }
  }

  private async exchange(channel: Channel, command: BridgeCommand, bytes: Buffer): Promise<BridgeResponse> {
    this.log.debug({ command: command.type, params: command.params }, "sending command");
    await channel.write(bytes, this.timeoutMs);

    const document = await this.frameReader.readFrame(channel, this.timeoutMs);
    const parsed = BridgeResponseSchema.safeParse(document);
    if (!parsed.success) {
      this.log.error({ command: command.type, raw: preview(document) }, "invalid response from Blender");
      throw new TransportError(
        "MALFORMED_RESPONSE",
        `Invalid response from Blender for "${command.type}": ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "response"}: ${issue.message}`)
          .join("; ")}`,
      );
    }
    this.log.debug({ command: command.type, status: parsed.data.status }, "response parsed");
    return parsed.data;
  }
}
