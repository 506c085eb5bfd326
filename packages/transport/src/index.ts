export {
  SocketChannel,
  describeAddress,
  openSocketChannel,
  type Channel,
  type ChannelFactory,
  type ChannelRead,
} from "./channel.js";
export {
  createJsonBoundaryScanner,
  jsonCodec,
  replaceNonFiniteLiterals,
  type BoundaryScanner,
  type DecodeAttempt,
  type DocumentCodec,
} from "./codec.js";
export {
  DEFAULT_CONNECTION_CONFIG,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
  resolveConnectionConfig,
  type ConnectionAddress,
  type ConnectionConfig,
  type ParsedConnectionConfig,
} from "./config.js";
export { ConnectionManager, type ConnectionManagerOptions, type HealthCheck } from "./connectionManager.js";
export { CommandDispatcher, type CommandDispatcherOptions, type CommandSender } from "./dispatcher.js";
export {
  TransportError,
  asTransportError,
  invalidatesConnection,
  isTransportError,
  type TransportErrorCode,
} from "./errors.js";
export { createSpeculativeFrameReader, type FrameReader, type SpeculativeFrameReaderOptions } from "./frameReader.js";
export { DispatchLock } from "./lock.js";
export { createLogger, logger, resolveLogLevel, type CreateLoggerOptions, type Logger } from "./logger.js";
export {
  BridgeCommandSchema,
  BridgeResponseSchema,
  JsonObjectSchema,
  JsonValueSchema,
  isErrorResponse,
  type BridgeCommand,
  type BridgeErrorResponse,
  type BridgeResponse,
  type BridgeSuccessResponse,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from "./protocol.js";
