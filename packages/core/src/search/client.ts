/**
 * Retrieval client for the knowledge base's public endpoint:
 *   POST {publicUrl}/api/v2/retrieve
 *
 * Uses query-scope credentials. Results come back in the backend's
 * relevance order.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { TokenProvider } from "../auth/iam-token.js";
import { UpstreamError, describeError } from "../errors/catalog.js";
import type { RetrievalType } from "../schemas/server-config.js";
import type { SearchResult } from "./types.js";

const RetrieveResponseSchema = z.object({
  results: z
    .array(
      z.object({
        id: z.union([z.string(), z.number()]).nullish(),
        content: z.string().nullish(),
        score: z.number().nullish(),
        metadata: z.record(z.string(), z.unknown()).nullish(),
      }),
    )
    .default([]),
});

type RawResult = z.infer<typeof RetrieveResponseSchema>["results"][number];

const SOURCE_FIELDS = ["source", "file_name", "filename", "path", "s3_key"];

export interface RetrieveParams {
  query: string;
  versionId: string;
  topK: number;
}

export interface SearchBackend {
  retrieve(params: RetrieveParams): Promise<SearchResult[]>;
}

export interface SearchBackendOptions {
  publicUrl: string;
  retrievalType: RetrievalType;
  tokens: TokenProvider<"query">;
  logger: Logger;
}

function sourceReference(
  id: string | null,
  metadata: Record<string, unknown>,
): string | null {
  for (const field of SOURCE_FIELDS) {
    const value = metadata[field];
    if (typeof value === "string" && value !== "") return value;
  }
  return id;
}

function toSearchResult(raw: RawResult): SearchResult {
  const id = raw.id === null || raw.id === undefined ? null : String(raw.id);
  const metadata = raw.metadata ?? {};
  return {
    id,
    content: raw.content ?? "",
    score: raw.score ?? 0,
    sourceReference: sourceReference(id, metadata),
    metadata,
  };
}

export function createSearchBackend(
  options: SearchBackendOptions,
): SearchBackend {
  const { tokens, logger, retrievalType } = options;
  const base = options.publicUrl.replace(/\/+$/, "");

  return {
    async retrieve({ query, versionId, topK }) {
      if (!base) {
        throw new UpstreamError("retrieve", "Knowledge base URL is not configured");
      }
      const token = await tokens.getToken();

      let res: Response;
      try {
        res = await fetch(`${base}/api/v2/retrieve`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${token}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            knowledge_base_version: versionId,
            query,
            retrieval_configuration: {
              number_of_results: topK,
              retrieval_type: retrievalType,
            },
          }),
        });
      } catch (err) {
        throw new UpstreamError(
          "retrieve",
          `Retrieve request failed: ${describeError(err)}`,
          { versionId },
        );
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new UpstreamError(
          "retrieve",
          `Retrieve failed: ${res.status} ${res.statusText}`,
          { versionId, status: res.status, response: text.slice(0, 500) },
        );
      }

      const parsed = RetrieveResponseSchema.safeParse(
        await res.json().catch(() => undefined),
      );
      if (!parsed.success) {
        throw new UpstreamError("retrieve", "Malformed retrieve response", {
          versionId,
        });
      }

      logger.debug(
        { versionId, topK, count: parsed.data.results.length },
        "Retrieve completed",
      );
      return parsed.data.results.map(toSearchResult);
    },
  };
}
