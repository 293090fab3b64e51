/**
 * Best-effort archival of processed source files.
 */

import * as fs from 'node:fs/promises'
import { ArchivalWarning } from './errors.js'
import { createLogger, errorMessage } from './logger.js'
import type { Logger } from './logger.js'

/** Result of an archival attempt. */
export type ArchiveResult =
  | { moved: true }
  | { moved: false; warning: ArchivalWarning }

/**
 * Moves source files into an archive location after processing.
 *
 * @remarks
 * Archival never fails an operation: every failure is logged at warn level
 * and reported as an {@link ArchivalWarning}, and the source stays where it
 * was. Missing directories are not created and an existing archive file is
 * never overwritten.
 *
 * @public
 */
export class ArchiveManager {
  readonly #logger: Logger

  constructor(logger?: Logger) {
    this.#logger = logger ?? createLogger('sealpost').child({ component: 'archive' })
  }

  async move(sourcePath: string, archivePath: string): Promise<ArchiveResult> {
    try {
      await linkExclusive(sourcePath, archivePath)
      try {
        await fs.unlink(sourcePath)
      } catch (error) {
        await fs.unlink(archivePath)
        throw error
      }
    } catch (error) {
      const warning = new ArchivalWarning(
        `Failed to archive [${sourcePath}] to [${archivePath}]: ${errorMessage(error)}`,
        sourcePath,
        archivePath,
        { cause: error },
      )
      this.#logger.warn({ sourcePath, archivePath, err: error }, warning.message)
      return { moved: false, warning }
    }

    this.#logger.info({ sourcePath, archivePath }, 'Source file archived')
    return { moved: true }
  }
}

// link(2) refuses an existing target, so a file created by a concurrent
// archival is never replaced.
async function linkExclusive(sourcePath: string, archivePath: string): Promise<void> {
  try {
    await fs.link(sourcePath, archivePath)
  } catch (error) {
    if (hasCode(error, 'EEXIST')) {
      throw new Error(`Archive file [${archivePath}] already exists`, { cause: error })
    }
    throw error
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
