import { CredentialsError } from "../errors/catalog.js";

/**
 * Credential scopes. Query and indexing keys are kept apart so a leaked
 * read key cannot trigger rebuilds; storage keys only list and read
 * catalog artifacts.
 */
export type CredentialScope = "query" | "indexing";

export interface ScopedCredentials<S extends CredentialScope> {
  readonly scope: S;
  readonly keyId: string;
  readonly secret: string;
}

export type QueryCredentials = ScopedCredentials<"query">;
export type IndexingCredentials = ScopedCredentials<"indexing">;

export interface StorageCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
}

const SCOPE_ENV: Record<CredentialScope, { keyId: string; secret: string }> = {
  query: { keyId: "RAG_QUERY_KEY_ID", secret: "RAG_QUERY_SECRET" },
  indexing: { keyId: "RAG_INDEXING_KEY_ID", secret: "RAG_INDEXING_SECRET" },
};

function readVars(
  env: NodeJS.ProcessEnv,
  names: string[],
): { values: string[]; missing: string[] } {
  const values: string[] = [];
  const missing: string[] = [];
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      values.push(value);
    } else {
      missing.push(name);
    }
  }
  return { values, missing };
}

export function loadScopedCredentials<S extends CredentialScope>(
  scope: S,
  env: NodeJS.ProcessEnv = process.env,
): ScopedCredentials<S> {
  const names = SCOPE_ENV[scope];
  const { values, missing } = readVars(env, [names.keyId, names.secret]);
  const [keyId, secret] = values;
  if (missing.length > 0 || keyId === undefined || secret === undefined) {
    throw new CredentialsError(scope, missing);
  }
  return { scope, keyId, secret };
}

/** S3 access key ids are `<tenantId>:<keyId>` on the object storage. */
export function loadStorageCredentials(
  env: NodeJS.ProcessEnv = process.env,
): StorageCredentials {
  const { values, missing } = readVars(env, [
    "S3_TENANT_ID",
    "S3_KEY_ID",
    "S3_SECRET",
  ]);
  const [tenantId, keyId, secret] = values;
  if (
    missing.length > 0 ||
    tenantId === undefined ||
    keyId === undefined ||
    secret === undefined
  ) {
    throw new CredentialsError("storage", missing);
  }
  return { accessKeyId: `${tenantId}:${keyId}`, secretAccessKey: secret };
}
