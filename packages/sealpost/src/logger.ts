/**
 * Structured logging for sealpost.
 */

import { pino } from 'pino'
import type { Logger } from 'pino'

export type { Logger }

/**
 * Create a logger instance with the given name.
 *
 * @remarks
 * The level comes from `LOG_LEVEL` (default `info`). When `NODE_ENV` is
 * `development` output is pretty-printed.
 */
export function createLogger(name: string): Logger {
  return pino({
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    ...(process.env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  })
}

/** Convert an unknown thrown value to a message for log output. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
