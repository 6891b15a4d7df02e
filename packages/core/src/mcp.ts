/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for creating consistent tool responses.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 * A type alias rather than an interface so it satisfies the SDK's
 * open-ended result type.
 */
export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

/**
 * Anything that can be reported back to an agent as an error.
 */
export type ReportableError = string | { message: string };

/**
 * Create a response carrying a JSON document.
 */
export function jsonResponse(data: unknown): ToolResponse {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error response. The text is prefixed with "Error: ".
 */
export function errorResponse(error: ReportableError): ToolResponse {
  const message = typeof error === "string" ? error : error.message;
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Convert a Result to an MCP tool response.
 * On success, calls the formatter function.
 */
export function resultToResponse<T, E extends ReportableError>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(result.error);
}
