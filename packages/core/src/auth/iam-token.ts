/**
 * IAM token provider. Exchanges a key id and secret for a short-lived bearer
 * token at the IAM endpoint:
 *   POST {tokenUrl}  { keyId, secret }  ->  { access_token, expires_in }
 *
 * One provider exists per credential scope. The scope is carried in the type
 * so an indexing client cannot be built from a query-scope provider.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type {
  CredentialScope,
  ScopedCredentials,
} from "../config/credentials.js";
import { UpstreamError, describeError } from "../errors/catalog.js";

/** Tokens are refreshed once fewer than this many seconds remain. */
export const TOKEN_REFRESH_MARGIN_SECONDS = 300;
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export interface TokenProvider<S extends CredentialScope> {
  readonly scope: S;
  /** Returns a valid bearer token, fetching a new one when needed. */
  getToken(options?: { forceRefresh?: boolean }): Promise<string>;
}

export interface TokenProviderOptions<S extends CredentialScope> {
  tokenUrl: string;
  credentials: ScopedCredentials<S>;
  logger: Logger;
  /** Clock in milliseconds; injectable for tests. */
  now?: () => number;
}

const IamTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional().catch(undefined),
});

interface CachedToken {
  token: string;
  expiresAt: number;
}

export function createTokenProvider<S extends CredentialScope>(
  options: TokenProviderOptions<S>,
): TokenProvider<S> {
  const { tokenUrl, credentials, logger } = options;
  const now = options.now ?? Date.now;
  const scope = credentials.scope;

  let cached: CachedToken | null = null;
  let inFlight: Promise<string> | null = null;

  function isFresh(entry: CachedToken): boolean {
    return entry.expiresAt > now() + TOKEN_REFRESH_MARGIN_SECONDS * 1000;
  }

  async function fetchToken(): Promise<string> {
    logger.debug({ scope }, "Requesting IAM token");

    let res: Response;
    try {
      res = await fetch(tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          keyId: credentials.keyId,
          secret: credentials.secret,
        }),
      });
    } catch (err) {
      throw new UpstreamError("token", `IAM token request failed: ${describeError(err)}`, {
        scope,
      });
    }

    if (!res.ok) {
      throw new UpstreamError(
        "token",
        `IAM token request failed: ${res.status} ${res.statusText}`,
        { scope, status: res.status },
      );
    }

    const parsed = IamTokenResponseSchema.safeParse(
      await res.json().catch(() => undefined),
    );
    if (!parsed.success) {
      throw new UpstreamError("token", "IAM response has no access_token", {
        scope,
      });
    }
    const token = parsed.data.access_token;
    const expiresIn = parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;

    cached = { token, expiresAt: now() + expiresIn * 1000 };
    logger.info({ scope, expiresIn }, "IAM token obtained");
    return token;
  }

  return {
    scope,

    async getToken(opts) {
      if (!opts?.forceRefresh && cached && isFresh(cached)) {
        return cached.token;
      }
      // Concurrent callers share one request.
      if (!inFlight) {
        inFlight = fetchToken().finally(() => {
          inFlight = null;
        });
      }
      return inFlight;
    },
  };
}
