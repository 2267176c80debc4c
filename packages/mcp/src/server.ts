import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "./types.js";
import { registerStartIndexingTool } from "./tools/start-indexing.js";
import { registerGetVersionsTool } from "./tools/get-versions.js";
import { registerUpdateVersionTool } from "./tools/update-version.js";
import { registerSearchTools } from "./tools/search.js";

export function createMcpServer(ctx: McpContext): McpServer {
  const server = new McpServer({
    name: "managed-rag",
    version: "0.1.0",
  });

  registerStartIndexingTool(server, ctx);
  registerGetVersionsTool(server, ctx);
  registerUpdateVersionTool(server, ctx);
  registerSearchTools(server, ctx);

  return server;
}

export type { McpContext } from "./types.js";
