export {
  Ok,
  Err,
  map,
  andThen,
  tryCatch,
} from "./result.js";
export type { Result } from "./result.js";

export {
  jsonResponse,
  errorResponse,
  resultToResponse,
} from "./mcp.js";
export type { TextContent, ToolResponse, ReportableError } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
