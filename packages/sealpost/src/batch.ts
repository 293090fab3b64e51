/**
 * Folder-to-folder batch processing.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import type { ArchivalWarning, FileOperationError } from './errors.js'
import { createLogger } from './logger.js'
import type { Logger } from './logger.js'
import { SettingKeys, optionalSetting, requireSetting } from './settings.js'
import type { RuntimeSettings } from './types.js'
import type { CryptoWorkflow } from './workflow.js'

/** Which way a batch runs. */
export type BatchDirection = 'encrypt' | 'decrypt'

/** A file whose operation failed. */
export interface BatchFailure {
  sourcePath: string
  error: FileOperationError
}

/** Totals of a batch run. */
export interface BatchSummary {
  processed: number
  succeeded: number
  failures: BatchFailure[]
  archiveWarnings: ArchivalWarning[]
}

const ENCRYPTED_EXTENSION = '.asc'
const ENCRYPTED_EXTENSIONS = /\.(asc|pgp|gpg)$/i

/**
 * Name of the output file for `fileName`: encryption appends `.asc`,
 * decryption strips `.asc`, `.pgp` or `.gpg` when present.
 */
export function destinationFileName(fileName: string, direction: BatchDirection): string {
  if (direction === 'encrypt') {
    return `${fileName}${ENCRYPTED_EXTENSION}`
  }
  const stripped = fileName.replace(ENCRYPTED_EXTENSIONS, '')
  return stripped === '' ? fileName : stripped
}

/**
 * Process every regular file of `SourceFolderPath`, in name order, into
 * `DestinationFolderPath`, archiving sources into `ArchiveFolderPath` when
 * that setting is present.
 *
 * @remarks
 * Per-file failures are collected and processing continues with the next
 * file; run-level errors (configuration, keys, initialization) propagate.
 *
 * @throws ConfigurationError if a folder setting is missing
 */
export async function runBatch(
  workflow: CryptoWorkflow,
  settings: RuntimeSettings,
  direction: BatchDirection,
  logger: Logger = createLogger('sealpost').child({ component: 'batch' }),
): Promise<BatchSummary> {
  const sourceFolder = requireSetting(settings, SettingKeys.sourceFolder)
  const destinationFolder = requireSetting(settings, SettingKeys.destinationFolder)
  const archiveFolder = optionalSetting(settings, SettingKeys.archiveFolder)

  const entries = await fs.readdir(sourceFolder, { withFileTypes: true })
  const fileNames = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()

  const summary: BatchSummary = { processed: 0, succeeded: 0, failures: [], archiveWarnings: [] }
  logger.info({ direction, sourceFolder, files: fileNames.length }, 'Batch started')

  for (const fileName of fileNames) {
    const sourcePath = path.join(sourceFolder, fileName)
    const destinationPath = path.join(destinationFolder, destinationFileName(fileName, direction))
    const archivePath = archiveFolder !== undefined ? path.join(archiveFolder, fileName) : undefined

    const result =
      direction === 'encrypt'
        ? await workflow.encryptAndSignFile(sourcePath, destinationPath, archivePath)
        : await workflow.decryptAndVerifyFile(sourcePath, destinationPath, archivePath)

    summary.processed++
    if (result.ok) {
      summary.succeeded++
      if (result.value.archive?.moved === false) {
        summary.archiveWarnings.push(result.value.archive.warning)
      }
    } else {
      summary.failures.push({ sourcePath, error: result.error })
    }
  }

  logger.info(
    {
      direction,
      processed: summary.processed,
      succeeded: summary.succeeded,
      failed: summary.failures.length,
    },
    'Batch finished',
  )
  return summary
}
