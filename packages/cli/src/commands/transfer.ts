/**
 * Shared implementation of `sealpost encrypt` and `sealpost decrypt`.
 *
 * Flow:
 * 1. Parse flags and load settings
 * 2. Initialize the workflow against the keystore
 * 3. With `--source`/`--destination`, process that one file; otherwise run
 *    the batch over the configured folders
 * 4. Exit 0 only if every file succeeded
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { CryptoWorkflow, runBatch } from 'sealpost'
import type { ArchiveResult, BatchDirection, BatchSummary } from 'sealpost'
import { formatError } from '../output.js'
import { SETTINGS_USAGE, loadCliSettings } from '../settings.js'
import type { CommandDeps } from '../types.js'

function usage(direction: BatchDirection): string {
  return `Usage: sealpost ${direction} ${SETTINGS_USAGE} [--source <file> --destination <file> [--archive <file>]]\n`
}

function reportArchive(archive: ArchiveResult | undefined, archivePath: string | undefined): void {
  if (archive === undefined) return
  if (archive.moved) {
    process.stdout.write(`Archived source to ${String(archivePath)}\n`)
  } else {
    process.stderr.write(`Warning: ${archive.warning.message}\n`)
  }
}

function parseTransferArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: 'string' },
      appsettings: { type: 'string' },
      scenario: { type: 'string' },
      source: { type: 'string' },
      destination: { type: 'string' },
      archive: { type: 'string' },
    },
    strict: true,
  }).values
}

export async function transferCommand(
  direction: BatchDirection,
  args: string[],
  deps: CommandDeps,
): Promise<number> {
  let values: ReturnType<typeof parseTransferArgs>
  try {
    values = parseTransferArgs(args)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(usage(direction))
    return 1
  }

  if ((values.source === undefined) !== (values.destination === undefined)) {
    process.stderr.write('Error: --source and --destination must be given together\n')
    process.stderr.write(usage(direction))
    return 1
  }
  if (values.archive !== undefined && values.source === undefined) {
    process.stderr.write('Error: --archive requires --source and --destination\n')
    process.stderr.write(usage(direction))
    return 1
  }

  try {
    const settings = await loadCliSettings(values)
    const workflow = new CryptoWorkflow({
      settings,
      engine: deps.createEngine(settings),
      passphraseDeps: deps.passphraseDeps,
    })
    await workflow.init()

    if (values.source !== undefined && values.destination !== undefined) {
      return await transferFile(workflow, direction, values.source, values.destination, values.archive)
    }

    const summary = await runBatch(workflow, settings, direction)
    return printSummary(summary)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}

async function transferFile(
  workflow: CryptoWorkflow,
  direction: BatchDirection,
  source: string,
  destination: string,
  archive: string | undefined,
): Promise<number> {
  const result =
    direction === 'encrypt'
      ? await workflow.encryptAndSignFile(source, destination, archive)
      : await workflow.decryptAndVerifyFile(source, destination, archive)

  if (!result.ok) {
    process.stderr.write(`${formatError(result.error)}\n`)
    return 1
  }

  const verb = direction === 'encrypt' ? 'Encrypted' : 'Decrypted'
  process.stdout.write(`${verb} ${source} -> ${destination}\n`)
  reportArchive(result.value.archive, archive)
  return 0
}

function printSummary(summary: BatchSummary): number {
  process.stdout.write(
    `Processed ${String(summary.processed)} file(s): ${String(summary.succeeded)} succeeded, ${String(summary.failures.length)} failed\n`,
  )
  for (const warning of summary.archiveWarnings) {
    process.stderr.write(`Warning: ${warning.message}\n`)
  }
  for (const failure of summary.failures) {
    process.stderr.write(`  ${failure.sourcePath}: ${formatError(failure.error)}\n`)
  }
  return summary.failures.length > 0 ? 1 : 0
}
