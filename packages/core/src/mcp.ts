/**
 * Helpers for building MCP tool responses.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response. Carries an index signature because the SDK's
 * CallToolResult is an open object.
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Markdown response: a "## title" heading followed by the given lines.
 * Empty strings are kept as blank separator lines.
 */
export function markdownResponse(title: string, lines: string[]): ToolResponse {
  return textResponse([`## ${title}`, "", ...lines].join("\n"));
}

export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Turn a Result into a tool response, formatting successes with the given
 * function and failures as error responses.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  format: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return format(result.value);
  }
  return errorResponse(typeof result.error === "string" ? result.error : result.error.message);
}
