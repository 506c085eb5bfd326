import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CommandDispatcher,
  logger as rootLogger,
  type CommandSender,
  type ConnectionConfig,
  type Logger,
} from "@blender-bridge/transport";
import { registerBridgePrompts } from "./prompts.js";
import { registerBridgeTools } from "./tools.js";

export const MCP_SERVER_NAME = "blender-bridge";
export const MCP_SERVER_VERSION = "0.1.0";

export interface BridgeMcpServerContext {
  server: McpServer;
  dispatcher: CommandDispatcher;
}

export interface BridgeMcpServerOptions {
  logger?: Logger;
  /** Replaces the socket dispatcher for tool calls; used by tests. */
  sender?: CommandSender;
}

export function createBridgeMcpServer(
  config: ConnectionConfig,
  options: BridgeMcpServerOptions = {},
): BridgeMcpServerContext {
  const log = options.logger ?? rootLogger;
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });
  const dispatcher = CommandDispatcher.fromConfig(config, log);
  registerBridgeTools(server, options.sender ?? dispatcher, { logger: log.child({ module: "tools" }) });
  registerBridgePrompts(server);
  return {
    server,
    dispatcher,
  };
}

export async function startBridgeMcpServer(
  config: ConnectionConfig,
  options: BridgeMcpServerOptions = {},
): Promise<BridgeMcpServerContext> {
  const log = options.logger ?? rootLogger;
  const context = createBridgeMcpServer(config, options);
  const { server, dispatcher } = context;

  server.server.onclose = () => {
    dispatcher.close().then(
      () => log.info("MCP server closed"),
      (error: unknown) => log.error({ err: error }, "failed to release the Blender connection"),
    );
  };

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ host: config.host, port: config.port }, "MCP server started");

  try {
    await dispatcher.connect();
  } catch (error) {
    log.warn(
      { err: error },
      "Blender is not reachable yet; make sure the add-on is running. Tools will retry on each call.",
    );
  }

  return context;
}

export { ToolDefinitions, type BridgeToolName } from "./schema.js";
export { createToolHandlers, invokeTool, registerBridgeTools, type ToolResponse } from "./tools.js";
export { ASSET_CREATION_STRATEGY, ASSET_CREATION_STRATEGY_PROMPT, registerBridgePrompts } from "./prompts.js";
