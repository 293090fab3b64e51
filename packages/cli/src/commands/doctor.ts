/**
 * The `sealpost doctor` command: checks that gpg (and, on Windows,
 * PowerShell) can be run before a workflow is configured against them.
 *
 * @internal
 */

import { parseArgs } from 'node:util'
import { runDoctor } from 'sealpost'
import type { DoctorCheck } from 'sealpost'
import { bold, dim, formatError, statusIcon } from '../output.js'

function formatCheck(check: DoctorCheck): string {
  const optional = check.required ? '' : dim(' [optional]')
  const version = check.version !== undefined ? dim(` (${check.version})`) : ''
  const reason = check.reason !== undefined ? `: ${check.reason}` : ''
  return `  ${statusIcon(check.status === 'ok')} ${bold(check.name)}${optional}${version}${reason}\n`
}

export async function doctorCommand(args: string[]): Promise<number> {
  try {
    const { values } = parseArgs({
      args,
      options: {
        gpg: { type: 'string' },
      },
      strict: true,
    })
    const result = await runDoctor({ binary: values.gpg })

    for (const check of result.checks) {
      process.stdout.write(formatCheck(check))
    }

    if (result.warnings.length > 0) {
      process.stdout.write('\nWarnings:\n')
      for (const warning of result.warnings) {
        process.stdout.write(`  ⚠ ${warning}\n`)
      }
    }

    if (result.ready) {
      process.stdout.write('\nSystem ready.\n')
      return 0
    }

    process.stdout.write('\nNext steps:\n')
    for (const step of result.nextSteps) {
      process.stdout.write(`  → ${step}\n`)
    }
    return 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
