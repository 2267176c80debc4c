import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** Write to stderr, keeping stdout free for a stdio protocol. */
  stderr?: boolean
}

export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  if (options?.stderr) {
    return pino(
      { name: 'managed-rag', level: config.level },
      pino.destination(2),
    )
  }

  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name: 'managed-rag',
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}
