import { bodyLimit } from 'hono/body-limit'
import type { MiddlewareHandler } from 'hono'

/** 64 KB: API bodies are small JSON documents */
export const DEFAULT_MAX_SIZE = 64 * 1024

/**
 * Creates a Hono body-limit middleware that returns 413 JSON on overflow.
 */
export function createBodyLimit(maxSize: number = DEFAULT_MAX_SIZE): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: (c) => {
      return c.json(
        {
          error: {
            code: 413,
            errorCode: 'CONTENT_TOO_LARGE',
            message: `Request body exceeds maximum size of ${maxSize} bytes`,
          },
        },
        413,
      )
    },
  })
}
