/**
 * Indexing routes: POST /runs starts a new index version build.
 */

import { Hono } from "hono";
import { z } from "zod";
import { SUPPORTED_EXTENSIONS } from "@managed-rag/core/indexing";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import { readJsonBody } from "./body.js";

export interface IndexingRouteDeps {
  lifecycle: Pick<IndexLifecycle, "startIndexing">;
}

const StartRunBodySchema = z.object({
  sourcePrefix: z.string().default(""),
  description: z.string().optional(),
  extensions: z.array(z.enum(SUPPORTED_EXTENSIONS)).min(1).optional(),
});

export function indexingRoutes(deps: IndexingRouteDeps): Hono {
  const app = new Hono();

  app.post("/runs", async (c) => {
    const body = await readJsonBody(c, StartRunBodySchema);
    if (!body.ok) return body.response;

    const { sourcePrefix, description, extensions } = body.data;
    const job = await deps.lifecycle.startIndexing(sourcePrefix, {
      ...(description !== undefined && { description }),
      ...(extensions !== undefined && { extensions }),
    });
    return c.json(job, 202);
  });

  return app;
}
