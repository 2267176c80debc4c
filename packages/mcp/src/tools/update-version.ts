import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerUpdateVersionTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "rag_update_version",
    {
      title: "Update Active Version",
      description:
        "Switch searches to the newest READY version, or to the given READY version. Returns the previous and the applied version.",
      inputSchema: {
        versionId: z
          .string()
          .optional()
          .describe("Version to activate (default: latest READY version)"),
      },
      annotations: { idempotentHint: true },
    },
    async ({ versionId }) =>
      runTool(ctx, "rag_update_version", () =>
        ctx.lifecycle.updateActiveVersion(versionId),
      ),
  );
}
