export {
  type Result,
  Ok,
  Err,
  isOk,
  isErr,
  map,
  mapErr,
  andThen,
  unwrapOr,
  unwrap,
  fromNullable,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LogSink,
  LOG_LEVELS,
  createLogger,
  setDefaultLogLevel,
  getDefaultLogLevel,
  isLogLevel,
} from "./logger.js";

export { type TypeGraphConfig, ConfigError, loadConfig } from "./config.js";

export {
  type TextContent,
  type ToolResponse,
  textResponse,
  markdownResponse,
  errorResponse,
  resultToResponse,
} from "./mcp.js";

export {
  type ServerInfo,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
