import { LifecycleError } from "@managed-rag/core/errors";
import type { McpContext } from "../types.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function jsonResult(value: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Run a lifecycle operation and render its outcome as tool content.
 * Lifecycle errors become `isError` results carrying the same JSON body the
 * HTTP API answers with; anything else propagates to the SDK.
 */
export async function runTool(
  ctx: McpContext,
  tool: string,
  operation: () => Promise<unknown>,
): Promise<ToolResult> {
  try {
    return jsonResult(await operation());
  } catch (err) {
    if (!(err instanceof LifecycleError)) {
      throw err;
    }
    ctx.logger.warn(
      { tool, errorCode: err.errorCode, details: err.details },
      err.message,
    );
    return { ...jsonResult(err.toJSON()), isError: true };
  }
}
