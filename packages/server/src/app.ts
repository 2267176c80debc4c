import { Hono } from "hono";
import { cors } from "hono/cors";
import { LifecycleError } from "@managed-rag/core/errors";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import type { Logger } from "pino";
import { createBodyLimit } from "./middleware/body-limit.js";
import { createRequestLogMiddleware } from "./middleware/request-log.js";
import { healthRoute } from "./routes/health.js";
import { indexingRoutes } from "./routes/indexing.js";
import { mcpRoute } from "./routes/mcp.js";
import { searchRoutes } from "./routes/search.js";
import { versionsRoutes } from "./routes/versions.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  lifecycle: IndexLifecycle;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS: allow all origins for browser-based clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Authorization", "Mcp-Session-Id"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );
  app.use("*", createRequestLogMiddleware(deps.logger));
  app.use("/v1/*", createBodyLimit());

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      lifecycle: deps.lifecycle,
    }),
  );
  app.route("/v1/indexing", indexingRoutes({ lifecycle: deps.lifecycle }));
  app.route("/v1/versions", versionsRoutes({ lifecycle: deps.lifecycle }));
  app.route("/v1/search", searchRoutes({ lifecycle: deps.lifecycle }));
  app.route(
    "/mcp",
    mcpRoute({
      mcpContext: {
        lifecycle: deps.lifecycle,
        logger: deps.logger.child({ component: "mcp" }),
      },
    }),
  );

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof LifecycleError) {
      deps.logger.warn(
        { errorCode: err.errorCode, details: err.details },
        err.message,
      );
      return c.json(err.toJSON(), err.code);
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
