export type { Result } from "./result.js";
export { Ok, Err, map, mapErr, andThen, unwrap, tryCatch, errorMessage } from "./result.js";

export type { NetworkErrorCode, DuplicateIdWarning, Advisory } from "./errors.js";
export {
  NetworkError,
  StructuralError,
  NotFoundError,
  invalidInput,
  advisory,
} from "./errors.js";

export type { LogLevel, Logger, LogSink, LoggerOptions } from "./logger.js";
export { createLogger, parseLogLevel, isLogLevel } from "./logger.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, jsonResponse, errorResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
