import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  JsonObjectSchema,
  isErrorResponse,
  isTransportError,
  logger as rootLogger,
  type CommandSender,
  type JsonObject,
  type Logger,
} from "@blender-bridge/transport";
import type { AnyZodObject, ZodError } from "zod";
import { SendCommandInputSchema, ToolDefinitions, type BridgeToolName } from "./schema.js";

interface RegisterToolsOptions {
  logger?: Logger;
}

interface ToolFailure {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

interface ToolSuccess {
  ok: true;
  result: JsonObject;
}

export type ToolResponse = ToolSuccess | ToolFailure;

export type ToolHandler = (input: unknown) => Promise<ToolResponse>;

export type ToolHandlerMap = ReadonlyMap<BridgeToolName, ToolHandler>;

interface ForwardedTool {
  name: BridgeToolName;
  description: string;
  command?: string;
  input: AnyZodObject;
  wireKeys?: Readonly<Record<string, string>>;
}

const FORWARDED_TOOLS: readonly ForwardedTool[] = ToolDefinitions;

function toToolResult(payload: ToolResponse) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    isError: !payload.ok,
  };
}

function invalidInput(error: ZodError): ToolFailure {
  return {
    ok: false,
    error: {
      code: "INVALID_INPUT",
      message: error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; "),
    },
  };
}

function resolveError(error: unknown, log: Logger, commandType: string): ToolFailure {
  if (isTransportError(error)) {
    return {
      ok: false,
      error: {
        code: error.code,
        message: error.message,
      },
    };
  }
  log.error({ err: error, command: commandType }, "unexpected error forwarding command");
  return {
    ok: false,
    error: {
      code: "BRIDGE_ERROR",
      message: error instanceof Error ? error.message : `Unexpected error running "${commandType}".`,
    },
  };
}

/**
 * Declared-but-omitted optional fields are forwarded as null so the add-on
 * always sees the full parameter set of a command.
 */
function toCommandParams(tool: ForwardedTool, values: Record<string, unknown>) {
  const filled: Record<string, unknown> = {};
  for (const key of Object.keys(tool.input.shape)) {
    filled[tool.wireKeys?.[key] ?? key] = values[key] ?? null;
  }
  return JsonObjectSchema.safeParse(filled);
}

async function forward(
  sender: CommandSender,
  commandType: string,
  params: JsonObject,
  log: Logger,
): Promise<ToolResponse> {
  try {
    const response = await sender.send(commandType, params);
    if (isErrorResponse(response)) {
      log.warn({ command: commandType, message: response.message }, "Blender reported an error");
      return {
        ok: false,
        error: {
          code: "HOST_ERROR",
          message: response.message,
        },
      };
    }
    return { ok: true, result: response.result };
  } catch (error) {
    return resolveError(error, log, commandType);
  }
}

function createForwardingHandler(tool: ForwardedTool, sender: CommandSender, log: Logger): ToolHandler {
  return async (input) => {
    const parsed = tool.input.safeParse(input ?? {});
    if (!parsed.success) {
      return invalidInput(parsed.error);
    }
    const params = toCommandParams(tool, parsed.data);
    if (!params.success) {
      return invalidInput(params.error);
    }
    return forward(sender, tool.command ?? tool.name, params.data, log);
  };
}

function createSendCommandHandler(sender: CommandSender, log: Logger): ToolHandler {
  return async (input) => {
    const parsed = SendCommandInputSchema.safeParse(input ?? {});
    if (!parsed.success) {
      return invalidInput(parsed.error);
    }
    return forward(sender, parsed.data.command_type, parsed.data.params, log);
  };
}

export function createToolHandlers(sender: CommandSender, options: RegisterToolsOptions = {}): ToolHandlerMap {
  const log = options.logger ?? rootLogger.child({ module: "tools" });
  const handlers = new Map<BridgeToolName, ToolHandler>();
  for (const tool of FORWARDED_TOOLS) {
    handlers.set(
      tool.name,
      tool.name === "send_command" ? createSendCommandHandler(sender, log) : createForwardingHandler(tool, sender, log),
    );
  }
  return handlers;
}

export async function invokeTool(
  sender: CommandSender,
  name: BridgeToolName,
  input: unknown,
  options: RegisterToolsOptions = {},
): Promise<ToolResponse> {
  const handler = createToolHandlers(sender, options).get(name);
  if (!handler) {
    return { ok: false, error: { code: "UNKNOWN_TOOL", message: `Unknown tool "${name}".` } };
  }
  return handler(input);
}

export function registerBridgeTools(server: McpServer, sender: CommandSender, options: RegisterToolsOptions = {}) {
  const handlers = createToolHandlers(sender, options);

  for (const tool of FORWARDED_TOOLS) {
    const handler = handlers.get(tool.name);
    if (!handler) continue;
    server.tool(tool.name, tool.description, tool.input.shape, async (input: unknown) => toToolResult(await handler(input)));
  }
}
