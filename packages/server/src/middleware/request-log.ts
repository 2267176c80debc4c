import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";

/**
 * Logs one line per request after the response is produced.
 * Server errors log at warn; everything else at debug.
 */
export function createRequestLogMiddleware(
  logger: Logger,
  now: () => number = Date.now,
): MiddlewareHandler {
  return async (c, next) => {
    const startedAt = now();
    await next();

    const entry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - startedAt,
    };
    if (c.res.status >= 500) {
      logger.warn(entry, "Request failed");
    } else {
      logger.debug(entry, "Request handled");
    }
  };
}
