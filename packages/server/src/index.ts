import { serve } from "@hono/node-server";
import { loadConfig } from "@managed-rag/core/config";
import { createServer, SERVER_VERSION } from "./bootstrap.js";

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const config = await loadConfig();
  const context = await createServer(config);
  const { app, logger } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port },
    (info) => {
      logger.info(
        { port: info.port, version: SERVER_VERSION },
        "HTTP server started",
      );
    },
  );

  // HTTP server is already listening; searches answer NO_ACTIVE_VERSION until this settles
  context.startBackgroundServices().catch((err: unknown) => {
    logger.error({ err }, "Failed to select startup index version");
  });

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
