import type { Logger } from "pino";
import { createTokenProvider } from "../auth/iam-token.js";
import { createCatalogReader } from "../catalog/reader.js";
import {
  loadScopedCredentials,
  loadStorageCredentials,
} from "../config/credentials.js";
import { createIndexingSubmitter } from "../indexing/submitter.js";
import type { ServerConfig } from "../schemas/server-config.js";
import { createSearchBackend } from "../search/client.js";
import { createReranker } from "../search/reranker.js";
import { createQueryRouter } from "../search/router.js";
import type { BlobStore } from "../storage/adapters/interface.js";
import { createS3BlobStore, createS3Client } from "../storage/adapters/s3.js";
import { ActiveVersionPointer } from "../versions/pointer.js";
import { createVersionSelector } from "../versions/selector.js";
import { createIndexLifecycle, type IndexLifecycle } from "./service.js";

export interface LifecycleContext {
  lifecycle: IndexLifecycle;
  pointer: ActiveVersionPointer;
}

export interface BuildLifecycleOptions {
  config: ServerConfig;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  /** Replaces the S3 blob store (and its credentials). */
  blobStore?: BlobStore;
}

/**
 * Build the lifecycle service from configuration. Each credential scope
 * gets its own token provider; none of them is shared.
 */
export function buildIndexLifecycle(
  options: BuildLifecycleOptions,
): LifecycleContext {
  const { config, logger } = options;
  const env = options.env ?? process.env;

  const queryTokens = createTokenProvider({
    tokenUrl: config.iam.tokenUrl,
    credentials: loadScopedCredentials("query", env),
    logger: logger.child({ component: "iam" }),
  });
  const indexingTokens = createTokenProvider({
    tokenUrl: config.iam.tokenUrl,
    credentials: loadScopedCredentials("indexing", env),
    logger: logger.child({ component: "iam" }),
  });

  const blobStore =
    options.blobStore ??
    createS3BlobStore({
      client: createS3Client(config.storage, loadStorageCredentials(env)),
      bucket: config.storage.bucket,
    });

  const pointer = new ActiveVersionPointer();
  const selector = createVersionSelector({
    pointer,
    logger: logger.child({ component: "selector" }),
  });
  const catalog = createCatalogReader({
    blobStore,
    catalogPrefix: config.storage.catalogPrefix,
    ragId: config.rag.id,
    logger: logger.child({ component: "catalog" }),
  });
  const submitter = createIndexingSubmitter({
    rag: config.rag,
    storage: config.storage,
    tokens: indexingTokens,
    logger: logger.child({ component: "indexing" }),
  });
  const router = createQueryRouter({
    pointer,
    backend: createSearchBackend({
      publicUrl: config.rag.publicUrl,
      retrievalType: config.rag.retrievalType,
      tokens: queryTokens,
      logger: logger.child({ component: "search" }),
    }),
    reranker: createReranker({
      url: config.reranker.url,
      model: config.reranker.model,
      tokens: queryTokens,
      logger: logger.child({ component: "reranker" }),
    }),
    limits: config.search,
    logger: logger.child({ component: "router" }),
  });

  const lifecycle = createIndexLifecycle({
    catalog,
    submitter,
    selector,
    pointer,
    router,
    logger,
    initialVersionId: config.rag.initialVersionId,
  });

  return { lifecycle, pointer };
}
