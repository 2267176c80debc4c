import { Hono } from "hono";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  lifecycle: Pick<IndexLifecycle, "getActiveVersion">;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();
    const { activeVersionId } = deps.lifecycle.getActiveVersion();

    return c.json({
      status: "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
      activeVersionId,
    });
  });

  return app;
}
