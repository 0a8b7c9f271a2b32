import { wrapError } from "@gradle-mcp/errors";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Tool-level failure: the client sees `isError` and a `{code, message}` body.
 */
export function errorResult(error: unknown): CallToolResult {
  const wrapped = wrapError(error);
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ code: wrapped.code, message: wrapped.message }, null, 2),
      },
    ],
    isError: true,
  };
}
