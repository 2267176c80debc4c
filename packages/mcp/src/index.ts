#!/usr/bin/env node
import { loadConfig } from "@managed-rag/core/config";
import { buildIndexLifecycle } from "@managed-rag/core/lifecycle";
import { createLogger } from "@managed-rag/core/logger";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "./server.js";

async function main(): Promise<void> {
  const config = await loadConfig();

  // Logger writes to stderr so stdout stays clean for MCP protocol
  const logger = createLogger(config.logging, { stderr: true });

  const { lifecycle } = buildIndexLifecycle({ config, logger });
  const activeVersionId = await lifecycle.initialize();
  logger.info({ versionId: activeVersionId }, "Index lifecycle initialized");

  const mcpServer = createMcpServer({ lifecycle, logger });
  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  logger.info("MCP server connected via stdio");

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutting down MCP server");
    mcpServer
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to close MCP server");
        process.exit(1);
      });
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("MCP server failed:", err);
  process.exit(1);
});
