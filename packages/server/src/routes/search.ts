import { Hono } from "hono";
import { z } from "zod";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import { readJsonBody } from "./body.js";

export interface SearchRouteDeps {
  lifecycle: Pick<IndexLifecycle, "search" | "searchAdvanced">;
}

// Limits are clamped by the query router, not rejected here.
const SearchBodySchema = z.object({
  query: z.string(),
  topK: z.number().optional(),
});

const AdvancedSearchBodySchema = SearchBodySchema.extend({
  rerankTopK: z.number().optional(),
});

export function searchRoutes(deps: SearchRouteDeps): Hono {
  const app = new Hono();

  app.post("/", async (c) => {
    const body = await readJsonBody(c, SearchBodySchema);
    if (!body.ok) return body.response;

    const { query, topK } = body.data;
    return c.json(await deps.lifecycle.search(query, topK));
  });

  app.post("/advanced", async (c) => {
    const body = await readJsonBody(c, AdvancedSearchBodySchema);
    if (!body.ok) return body.response;

    const { query, topK, rerankTopK } = body.data;
    return c.json(await deps.lifecycle.searchAdvanced(query, topK, rerankTopK));
  });

  return app;
}
