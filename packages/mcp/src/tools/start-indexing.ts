import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SUPPORTED_EXTENSIONS } from "@managed-rag/core/indexing";
import type { McpContext } from "../types.js";
import { runTool } from "./result.js";

export function registerStartIndexingTool(
  server: McpServer,
  ctx: McpContext,
): void {
  server.registerTool(
    "rag_start_indexing",
    {
      title: "Start Indexing",
      description:
        "Start building a new index version from documents in the bucket. Returns as soon as the run is accepted; the version appears in rag_get_versions once the backend records it. Call rag_update_version after it is READY.",
      inputSchema: {
        sourcePrefix: z
          .string()
          .default("")
          .describe(
            "Bucket prefix to index (e.g. 'documents/') or an s3://bucket/prefix URI. Empty string indexes the whole bucket",
          ),
        description: z
          .string()
          .optional()
          .describe("Description stored with the new version"),
        extensions: z
          .array(z.enum(SUPPORTED_EXTENSIONS))
          .min(1)
          .optional()
          .describe("File types to index (default: txt, md, pdf)"),
      },
    },
    async ({ sourcePrefix, description, extensions }) =>
      runTool(ctx, "rag_start_indexing", () =>
        ctx.lifecycle.startIndexing(sourcePrefix, {
          ...(description !== undefined && { description }),
          ...(extensions !== undefined && { extensions }),
        }),
      ),
  );
}
