/**
 * Version routes: list the catalog, read and switch the active version.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import { readJsonBody } from "./body.js";

export interface VersionsRouteDeps {
  lifecycle: Pick<
    IndexLifecycle,
    "getVersions" | "getActiveVersion" | "updateActiveVersion"
  >;
}

const UpdateActiveBodySchema = z.object({
  versionId: z.string().optional(),
});

export function versionsRoutes(deps: VersionsRouteDeps): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    return c.json(await deps.lifecycle.getVersions());
  });

  app.get("/active", (c) => {
    return c.json(deps.lifecycle.getActiveVersion());
  });

  // PUT /active: empty body selects the latest READY version
  app.put("/active", async (c) => {
    const body = await readJsonBody(c, UpdateActiveBodySchema);
    if (!body.ok) return body.response;

    return c.json(await deps.lifecycle.updateActiveVersion(body.data.versionId));
  });

  return app;
}
