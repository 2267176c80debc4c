import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerGetVersionsTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "rag_get_versions",
    {
      title: "Get Versions",
      description:
        "List index versions with their status (PENDING, RUNNING, READY, FAILED) and creation time, oldest first. Marks the version searches currently use.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    async () =>
      runTool(ctx, "rag_get_versions", () => ctx.lifecycle.getVersions()),
  );
}
