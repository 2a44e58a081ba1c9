/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";
import { errorMessage } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned from a registered tool handler.
 */
export type ToolResponse = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: true;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Pretty-printed JSON body, also exposed as structured content.
 */
export function jsonResponse(value: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Convert a Result to a tool response.
 * Ok goes through the formatter; Err becomes an error response.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(errorMessage(result.error));
}
