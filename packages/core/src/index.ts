export type { Result } from "./result.js";
export { Ok, Err, map, andThen, unwrapOr } from "./result.js";

export { QueryCancelledError, checkCancelled, isCancellation } from "./cancellation.js";

export type { Log } from "./logger.js";
export { createLogger, silentLog } from "./logger.js";

export type { TextContent, ToolResponse, FailurePayload } from "./mcp.js";
export { textResponse, errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
