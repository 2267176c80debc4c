/**
 * Reranking pass over an already-retrieved candidate window, via the
 * foundation-models rerank endpoint:
 *   POST {url}/rerank  { model, query, documents, top_n }
 *     -> { results: [{ index, relevance_score }] }
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { TokenProvider } from "../auth/iam-token.js";
import { UpstreamError, describeError } from "../errors/catalog.js";
import type { SearchResult } from "./types.js";

const RerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().min(0),
      relevance_score: z.number(),
    }),
  ),
});

export interface Reranker {
  /** Reorder candidates by relevance to the query, best first. */
  rerank(
    query: string,
    candidates: SearchResult[],
    topN: number,
  ): Promise<SearchResult[]>;
}

export interface RerankerOptions {
  url: string;
  model: string;
  tokens: TokenProvider<"query">;
  logger: Logger;
}

export function createReranker(options: RerankerOptions): Reranker {
  const { model, tokens, logger } = options;
  const endpoint = `${options.url.replace(/\/+$/, "")}/rerank`;

  return {
    async rerank(query, candidates, topN) {
      if (candidates.length === 0) return [];
      const token = await tokens.getToken();

      let res: Response;
      try {
        res = await fetch(endpoint, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model,
            query,
            documents: candidates.map((c) => c.content),
            top_n: topN,
          }),
        });
      } catch (err) {
        throw new UpstreamError(
          "rerank",
          `Rerank request failed: ${describeError(err)}`,
        );
      }

      if (!res.ok) {
        throw new UpstreamError(
          "rerank",
          `Rerank failed: ${res.status} ${res.statusText}`,
          { status: res.status },
        );
      }

      const parsed = RerankResponseSchema.safeParse(
        await res.json().catch(() => undefined),
      );
      if (!parsed.success) {
        throw new UpstreamError("rerank", "Malformed rerank response");
      }

      const reranked: SearchResult[] = [];
      const seen = new Set<number>();
      for (const item of [...parsed.data.results].sort(
        (a, b) => b.relevance_score - a.relevance_score,
      )) {
        // Highest score wins when the backend repeats an index.
        if (seen.has(item.index)) continue;
        seen.add(item.index);
        const candidate = candidates[item.index];
        if (!candidate) {
          throw new UpstreamError(
            "rerank",
            `Rerank result index ${item.index} is out of range`,
          );
        }
        reranked.push({ ...candidate, score: item.relevance_score });
      }

      logger.debug(
        { model, candidates: candidates.length, returned: reranked.length },
        "Rerank completed",
      );
      return reranked;
    },
  };
}
