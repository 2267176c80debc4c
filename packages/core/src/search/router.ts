/**
 * Query router: serves every search from the version the active pointer
 * names at the time of the call.
 *
 * searchAdvanced retrieves a wider candidate window and reranks only that
 * window. Reranking is an enhancement: when it fails the caller gets the
 * unranked top-k, the same set a plain search returns.
 */

import type { Logger } from "pino";
import { InvalidQueryError, describeError } from "../errors/catalog.js";
import type { SearchLimits } from "../schemas/server-config.js";
import type { ActiveVersionPointer } from "../versions/pointer.js";
import type { SearchBackend } from "./client.js";
import type { Reranker } from "./reranker.js";
import type { SearchResponse } from "./types.js";

export interface QueryRouter {
  search(query: string, topK?: number): Promise<SearchResponse>;
  searchAdvanced(
    query: string,
    topK?: number,
    rerankTopK?: number,
  ): Promise<SearchResponse>;
}

export interface QueryRouterOptions {
  pointer: ActiveVersionPointer;
  backend: SearchBackend;
  reranker: Reranker;
  limits: SearchLimits;
  logger: Logger;
}

/** Clamp into [min, max]; non-finite input falls back to `fallback`. */
export function clamp(
  value: number | undefined,
  min: number,
  max: number,
  fallback: number,
): number {
  const n =
    value === undefined || !Number.isFinite(value) ? fallback : Math.floor(value);
  return Math.min(Math.max(n, min), max);
}

function normalizeQuery(query: string): string {
  const trimmed = query.trim();
  if (trimmed === "") {
    throw new InvalidQueryError();
  }
  return trimmed;
}

export function createQueryRouter(options: QueryRouterOptions): QueryRouter {
  const { pointer, backend, reranker, limits, logger } = options;

  function clampTopK(topK: number | undefined): number {
    return clamp(topK, 1, limits.maxTopK, limits.defaultTopK);
  }

  return {
    async search(query, topK) {
      const versionId = pointer.require();
      const text = normalizeQuery(query);
      const k = clampTopK(topK);

      const results = await backend.retrieve({ query: text, versionId, topK: k });
      return {
        query: text,
        versionId,
        reranked: false,
        results: results.slice(0, k),
      };
    },

    async searchAdvanced(query, topK, rerankTopK) {
      const versionId = pointer.require();
      const text = normalizeQuery(query);
      const k = clampTopK(topK);
      const window = clamp(
        rerankTopK,
        k,
        Math.max(k, limits.maxCandidates),
        Math.max(k, limits.defaultRerankTopK),
      );

      const candidates = await backend.retrieve({
        query: text,
        versionId,
        topK: window,
      });

      try {
        const reranked = await reranker.rerank(text, candidates, k);
        return {
          query: text,
          versionId,
          reranked: true,
          results: reranked.slice(0, k),
        };
      } catch (err) {
        logger.warn(
          { versionId, window, err: describeError(err) },
          "Rerank failed, returning retrieval order",
        );
        return {
          query: text,
          versionId,
          reranked: false,
          results: candidates.slice(0, k),
        };
      }
    },
  };
}
