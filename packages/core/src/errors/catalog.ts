/**
 * Typed error catalog for the index lifecycle. Every error carries the HTTP
 * status the API answers with and a stable machine-readable code; MCP tools
 * return the same JSON body.
 */

/** HTTP statuses the lifecycle errors map to. */
export type LifecycleStatus = 400 | 404 | 409 | 500 | 502 | 503;

export class LifecycleError extends Error {
  constructor(
    public readonly code: LifecycleStatus,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/** Backend call that failed: which stage of the read path or auth flow. */
export type UpstreamStage = "token" | "retrieve" | "rerank";

export type SubmissionFailureReason =
  | "unauthorized"
  | "rejected"
  | "network"
  | "invalid_request"
  | "bucket_mismatch"
  | "missing_job_id";

// 400: Caller input

export class InvalidQueryError extends LifecycleError {
  constructor(details?: Record<string, unknown>) {
    super(400, "INVALID_QUERY", "Query must not be empty", details);
  }
}

export class InvalidVersionIdError extends LifecycleError {
  constructor(details?: Record<string, unknown>) {
    super(400, "INVALID_VERSION_ID", "Version id must not be empty", details);
  }
}

// 404 / 409: Version state

export class VersionNotFoundError extends LifecycleError {
  constructor(versionId: string) {
    super(404, "VERSION_NOT_FOUND", `Version ${versionId} is not in the catalog`, {
      versionId,
    });
  }
}

export class NoActiveVersionError extends LifecycleError {
  constructor() {
    super(
      409,
      "NO_ACTIVE_VERSION",
      "No active index version; update the active version first",
    );
  }
}

export class VersionNotReadyError extends LifecycleError {
  constructor(versionId: string, status: string) {
    super(409, "VERSION_NOT_READY", `Version ${versionId} is ${status}`, {
      versionId,
      status,
    });
  }
}

// 500: Local configuration

export class CredentialsError extends LifecycleError {
  constructor(scope: string, missing: string[]) {
    super(500, "CREDENTIALS_MISSING", `Missing ${scope} credentials`, {
      scope,
      missing,
    });
  }
}

// 502 / 503: Upstream services

export class SubmissionError extends LifecycleError {
  constructor(
    public readonly reason: SubmissionFailureReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(502, "SUBMISSION_FAILED", message, { reason, ...details });
  }
}

export class UpstreamError extends LifecycleError {
  constructor(
    public readonly stage: UpstreamStage,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(502, "UPSTREAM_ERROR", message, { stage, ...details });
  }
}

export class CatalogUnavailableError extends LifecycleError {
  constructor(details?: Record<string, unknown>) {
    super(503, "CATALOG_UNAVAILABLE", "Version catalog is unavailable", details);
  }
}

/** Extract a printable message from an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
