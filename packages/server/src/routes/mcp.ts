import { Hono } from "hono";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import { createMcpServer } from "@managed-rag/mcp";
import type { McpContext } from "@managed-rag/mcp";

export interface McpRouteDeps {
  mcpContext: McpContext;
}

/** Stateless streamable-HTTP endpoint: one MCP server per request. */
export function mcpRoute(deps: McpRouteDeps): Hono {
  const app = new Hono();

  app.all("/", async (c) => {
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    const server = createMcpServer(deps.mcpContext);
    await server.connect(transport);
    return transport.handleRequest(c.req.raw);
  });

  return app;
}
