/**
 * MCP tool response helpers.
 * Every tool answers with a markdown text block plus a structured payload
 * whose `success` flag separates failures from empty results.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export type FailurePayload = { success: false; error: string } & Record<string, unknown>;

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Failure response. `details` is merged into the structured payload, e.g. an
 * error code the client can branch on.
 */
export function errorResponse(
  message: string,
  details: Record<string, unknown> = {}
): ToolResponse<FailurePayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { ...details, success: false, error: message },
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Turn a Result into a tool response: the formatter renders successes, the
 * error's message (and whatever `errorDetails` extracts) renders failures.
 */
export function resultToResponse<T, E extends { message: string }, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S },
  errorDetails: (error: E) => Record<string, unknown> = () => ({})
): ToolResponse<(S & { success: true }) | FailurePayload> {
  if (!result.ok) {
    return errorResponse(result.error.message, errorDetails(result.error));
  }
  const { text, data } = formatter(result.value);
  return successResponse(text, data);
}
