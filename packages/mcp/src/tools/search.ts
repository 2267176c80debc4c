import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

const query = z.string().describe("Natural-language search query");

export function registerSearchTools(server: McpServer, ctx: McpContext): void {
  server.registerTool(
    "rag_search",
    {
      title: "Search",
      description:
        "Semantic search over the active index version. Returns the most relevant document fragments.",
      inputSchema: {
        query,
        topK: z
          .number()
          .optional()
          .describe(
            "Number of results (default 5); clamped to the configured maximum",
          ),
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      runTool(ctx, "rag_search", () =>
        ctx.lifecycle.search(args.query, args.topK),
      ),
  );

  server.registerTool(
    "rag_search_advanced",
    {
      title: "Search With Reranking",
      description:
        "Two-stage search: retrieve a wider candidate set from the active version, then rerank it for relevance. Falls back to plain ranking if the reranker is unavailable (reranked: false).",
      inputSchema: {
        query,
        topK: z
          .number()
          .optional()
          .describe(
            "Number of results after reranking (default 5); clamped to the configured maximum",
          ),
        rerankTopK: z
          .number()
          .optional()
          .describe(
            "Number of candidates to rerank (default 20); clamped to at least topK and at most the configured candidate limit",
          ),
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      runTool(ctx, "rag_search_advanced", () =>
        ctx.lifecycle.searchAdvanced(args.query, args.topK, args.rerankTopK),
      ),
  );
}
