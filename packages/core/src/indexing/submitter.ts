/**
 * Starts indexing runs on the managed backend:
 *   POST {indexingApiUrl}/rags/runs
 *
 * Authenticates with the indexing scope only. Submission returns as soon as
 * the backend accepts the run; the new version shows up in the catalog
 * later, so callers poll the catalog rather than wait here.
 */

import type { Logger } from "pino";
import type { TokenProvider } from "../auth/iam-token.js";
import {
  LifecycleError,
  SubmissionError,
  UpstreamError,
  describeError,
} from "../errors/catalog.js";
import type { RagConfig, StorageConfig } from "../schemas/server-config.js";
import {
  SUPPORTED_EXTENSIONS,
  buildExtractors,
  isDocumentExtension,
  type DocumentExtension,
} from "./extractors.js";

export interface StartIndexingParams {
  /** Bucket-relative prefix ("docs/") or "s3://<bucket>/<prefix>". */
  sourcePrefix: string;
  description?: string;
  /** File types to extract; defaults to every supported type. */
  extensions?: string[];
}

export interface IndexingJob {
  jobId: string;
  sourcePrefix: string;
  extensions: DocumentExtension[];
  submittedAt: Date;
}

export interface IndexingSubmitter {
  startIndexing(params: StartIndexingParams): Promise<IndexingJob>;
}

export interface IndexingSubmitterOptions {
  rag: Pick<
    RagConfig,
    "id" | "projectId" | "productInstanceId" | "indexingApiUrl" | "embedderModel"
  >;
  storage: Pick<StorageConfig, "bucket" | "bucketId">;
  tokens: TokenProvider<"indexing">;
  logger: Logger;
  now?: () => Date;
}

const JOB_ID_FIELDS = ["id", "run_id", "version_id"] as const;
const ACCEPTED_STATUSES = new Set([200, 201, 202]);

/**
 * Normalize a source location to a bucket-relative prefix. An s3:// URI
 * must name the configured bucket.
 */
export function normalizeSourcePrefix(source: string, bucket: string): string {
  const trimmed = source.trim();
  if (!trimmed.startsWith("s3://")) {
    return trimmed.replace(/^\/+/, "");
  }
  const rest = trimmed.slice("s3://".length);
  const slash = rest.indexOf("/");
  const uriBucket = slash === -1 ? rest : rest.slice(0, slash);
  if (uriBucket !== bucket) {
    throw new SubmissionError(
      "bucket_mismatch",
      `Source bucket ${uriBucket} is not the indexed bucket ${bucket}`,
      { sourcePrefix: source, bucket },
    );
  }
  return slash === -1 ? "" : rest.slice(slash + 1);
}

function resolveExtensions(requested?: string[]): DocumentExtension[] {
  if (requested === undefined || requested.length === 0) {
    return [...SUPPORTED_EXTENSIONS];
  }
  const normalized = requested.map((ext) =>
    ext.trim().toLowerCase().replace(/^\./, ""),
  );
  const unknown = normalized.filter((ext) => !isDocumentExtension(ext));
  if (unknown.length > 0) {
    throw new SubmissionError(
      "invalid_request",
      `Unsupported extensions: ${unknown.join(", ")}`,
      { supported: [...SUPPORTED_EXTENSIONS] },
    );
  }
  return [...new Set(normalized.filter(isDocumentExtension))];
}

function readJobId(body: unknown): string | null {
  if (typeof body !== "object" || body === null) return null;
  for (const field of JOB_ID_FIELDS) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === "string" && value !== "") return value;
  }
  return null;
}

/**
 * A rejected IAM exchange (401/403) or bad credentials mean "unauthorized".
 * Any other token-stage failure is an outage of the IAM service.
 */
function tokenFailureReason(err: unknown): "unauthorized" | "network" {
  if (err instanceof UpstreamError && err.stage === "token") {
    const status = err.details?.status;
    return status === 401 || status === 403 ? "unauthorized" : "network";
  }
  return "unauthorized";
}

export function createIndexingSubmitter(
  options: IndexingSubmitterOptions,
): IndexingSubmitter {
  const { rag, storage, tokens, logger } = options;
  const now = options.now ?? (() => new Date());
  const url = `${rag.indexingApiUrl.replace(/\/+$/, "")}/rags/runs`;

  function buildPayload(
    sourcePrefix: string,
    extensions: DocumentExtension[],
    description: string,
  ): Record<string, unknown> {
    const runOptions = {
      auth_is_enabled: false,
      service_account_id: "",
      logaas_is_enabled: false,
      logaas_log_group_id: "",
    };
    return {
      project_id: rag.projectId,
      rag_id: rag.id,
      product_instance_id: rag.productInstanceId,
      cpu_requested: 2,
      ram_requested: 2,
      deploy_params: {
        version: "v0",
        transformer: {
          model: "openai",
          extra_envs: {
            EMBEDDER_NAME: rag.embedderModel,
            EMBEDDER_MODEL_ID: rag.embedderModel,
            EMBEDDER_TYPE: "foundationModels",
          },
        },
        extractors: buildExtractors(extensions),
        options: runOptions,
        s3_storage: {
          s3_bucket_id: storage.bucketId,
          s3_bucket: storage.bucket,
          s3_prefix: sourcePrefix,
        },
      },
      embedder: {
        name: rag.embedderModel,
        model_id: rag.embedderModel,
        type: "foundationModels",
      },
      options: runOptions,
      description,
    };
  }

  return {
    async startIndexing(params) {
      const sourcePrefix = normalizeSourcePrefix(
        params.sourcePrefix,
        storage.bucket,
      );
      const extensions = resolveExtensions(params.extensions);

      let token: string;
      try {
        token = await tokens.getToken();
      } catch (err) {
        throw new SubmissionError(
          tokenFailureReason(err),
          `Could not obtain indexing token: ${describeError(err)}`,
          err instanceof LifecycleError ? { cause: err.errorCode } : undefined,
        );
      }

      logger.info(
        { ragId: rag.id, sourcePrefix, extensions },
        "Submitting indexing run",
      );

      let res: Response;
      try {
        res = await fetch(url, {
          method: "POST",
          headers: {
            Accept: "application/json, text/plain, */*",
            Authorization: `Bearer ${token}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(
            buildPayload(sourcePrefix, extensions, params.description ?? ""),
          ),
        });
      } catch (err) {
        throw new SubmissionError(
          "network",
          `Indexing request failed: ${describeError(err)}`,
        );
      }

      if (res.status === 401 || res.status === 403) {
        throw new SubmissionError(
          "unauthorized",
          `Indexing credentials rejected: ${res.status}`,
          { status: res.status },
        );
      }
      if (!ACCEPTED_STATUSES.has(res.status)) {
        const text = await res.text().catch(() => "");
        logger.error(
          { status: res.status, body: text.slice(0, 500) },
          "Indexing run rejected",
        );
        throw new SubmissionError(
          "rejected",
          `Indexing run rejected: ${res.status} ${res.statusText}`,
          { status: res.status, response: text.slice(0, 500) },
        );
      }

      const text = await res.text();
      let body: unknown = null;
      try {
        body = text ? JSON.parse(text) : null;
      } catch {
        body = null;
      }
      const jobId = readJobId(body);
      if (jobId === null) {
        throw new SubmissionError(
          "missing_job_id",
          "Indexing run accepted without a job id",
          { status: res.status },
        );
      }

      logger.info({ jobId, sourcePrefix }, "Indexing run submitted");
      return { jobId, sourcePrefix, extensions, submittedAt: now() };
    },
  };
}
