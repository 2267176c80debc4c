import { createRequire } from "node:module";
import type { ServerConfig } from "@managed-rag/core/schemas";
import {
  buildIndexLifecycle,
  type IndexLifecycle,
} from "@managed-rag/core/lifecycle";
import { createLogger, type Logger } from "@managed-rag/core/logger";
import type { BlobStore } from "@managed-rag/core/storage/adapters";
import type { ActiveVersionPointer } from "@managed-rag/core/versions";
import type { Hono } from "hono";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");

function readVersion(manifest: unknown): string {
  if (
    manifest !== null &&
    typeof manifest === "object" &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

export const SERVER_VERSION = readVersion(pkg);

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  lifecycle: IndexLifecycle;
  pointer: ActiveVersionPointer;
  /** Select the startup version; the server answers requests before this settles. */
  startBackgroundServices: () => Promise<void>;
}

export interface CreateServerOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Replaces the S3-backed catalog store. */
  blobStore?: BlobStore;
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const { lifecycle, pointer } = buildIndexLifecycle({
    config,
    logger,
    env: options?.env,
    blobStore: options?.blobStore,
  });

  const app = createApp({
    logger,
    version: SERVER_VERSION,
    startedAt,
    lifecycle,
  });

  return {
    app,
    logger,
    config,
    startedAt,
    lifecycle,
    pointer,
    startBackgroundServices: async () => {
      const versionId = await lifecycle.initialize();
      if (!versionId) {
        logger.warn(
          "No active index version; searches fail until a version is applied",
        );
      }
    },
  };
}
