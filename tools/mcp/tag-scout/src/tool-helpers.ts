/**
 * Shared helpers for MCP tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { isTagScoutError } from "./errors.js";
import { withLogging } from "./logger.js";

/** Re-export McpServer type for tool group files */
export type { McpServer };

/** Standard MCP tool response wrapping data as JSON */
export function toolResponse(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof data === "string" ? data : JSON.stringify(data, null, 2),
      },
    ],
  };
}

/** Error text for a tool response; tag-scout errors carry their code */
export function describeError(error: unknown): string {
  if (isTagScoutError(error)) return `Error [${error.code}]: ${error.message}`;
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/** Standard MCP tool error response */
export function toolError(error: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: describeError(error),
      },
    ],
    isError: true as const,
  };
}

/**
 * Wrap an async tool handler with logging, metrics, and error responses.
 */
export function wrapTool<T>(
  toolName: string,
  handler: (params: T) => Promise<ReturnType<typeof toolResponse>>
): (params: T) => Promise<ReturnType<typeof toolResponse> | ReturnType<typeof toolError>> {
  return async (params: T) => {
    try {
      return await withLogging(toolName, () => handler(params));
    } catch (error) {
      return toolError(error);
    }
  };
}
