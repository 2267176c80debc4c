import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8000,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  storage: {
    endpoint: "https://s3.cloud.ru",
    region: "ru-central-1",
    bucket: "rag-documents",
    bucketId: "",
    forcePathStyle: true,
    catalogPrefix: "ArtifactsManagedRAG",
  },
  iam: {
    tokenUrl: "https://iam.api.cloud.ru/api/v1/auth/token",
  },
  rag: {
    id: "",
    projectId: "",
    productInstanceId: "",
    publicUrl: "",
    indexingApiUrl:
      "https://console.cloud.ru/u-api/managed-rag/user-plane/api/v1",
    retrievalType: "SEMANTIC" as const,
    embedderModel: "Qwen/Qwen3-Embedding-0.6B",
    initialVersionId: null,
  },
  search: {
    defaultTopK: 5,
    maxTopK: 50,
    defaultRerankTopK: 20,
    maxCandidates: 100,
  },
  reranker: {
    url: "https://foundation-models.api.cloud.ru/v1",
    model: "BAAI/bge-reranker-v2-m3",
  },
};

export const RetrievalType = z.enum(["SEMANTIC", "KEYWORD", "HYBRID"]);
export type RetrievalType = z.infer<typeof RetrievalType>;

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  storage: z
    .object({
      endpoint: z.url().default(DEFAULTS.storage.endpoint),
      region: z.string().min(1).default(DEFAULTS.storage.region),
      bucket: z.string().min(1).default(DEFAULTS.storage.bucket),
      bucketId: z
        .string()
        .default(DEFAULTS.storage.bucketId)
        .describe("Backend-side identifier of the bucket, sent with indexing runs"),
      forcePathStyle: z.boolean().default(DEFAULTS.storage.forcePathStyle),
      catalogPrefix: z
        .string()
        .min(1)
        .default(DEFAULTS.storage.catalogPrefix)
        .describe("Prefix under which the backend writes version artifacts"),
    })
    .default(DEFAULTS.storage),
  iam: z
    .object({
      tokenUrl: z.url().default(DEFAULTS.iam.tokenUrl),
    })
    .default(DEFAULTS.iam),
  rag: z
    .object({
      id: z.string().default(DEFAULTS.rag.id),
      projectId: z.string().default(DEFAULTS.rag.projectId),
      productInstanceId: z.string().default(DEFAULTS.rag.productInstanceId),
      publicUrl: z
        .string()
        .default(DEFAULTS.rag.publicUrl)
        .describe("Public retrieval endpoint of the knowledge base"),
      indexingApiUrl: z.url().default(DEFAULTS.rag.indexingApiUrl),
      retrievalType: RetrievalType.default(DEFAULTS.rag.retrievalType),
      embedderModel: z.string().min(1).default(DEFAULTS.rag.embedderModel),
      initialVersionId: z
        .string()
        .min(1)
        .nullable()
        .default(DEFAULTS.rag.initialVersionId)
        .describe("Version to serve at startup if it is READY"),
    })
    .default(DEFAULTS.rag),
  search: z
    .object({
      defaultTopK: z.number().int().min(1).default(DEFAULTS.search.defaultTopK),
      maxTopK: z.number().int().min(1).default(DEFAULTS.search.maxTopK),
      defaultRerankTopK: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.search.defaultRerankTopK),
      maxCandidates: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.search.maxCandidates),
    })
    .default(DEFAULTS.search),
  reranker: z
    .object({
      url: z.url().default(DEFAULTS.reranker.url),
      model: z.string().min(1).default(DEFAULTS.reranker.model),
    })
    .default(DEFAULTS.reranker),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type StorageConfig = ServerConfig["storage"];
export type RagConfig = ServerConfig["rag"];
export type SearchLimits = ServerConfig["search"];
