/**
 * Preflight checks for the programs the workflow shells out to.
 *
 * @packageDocumentation
 */

import { checkGpg, checkPowershell } from './checks.js'
import { currentPlatform } from '../util/platform.js'
import type { Platform } from '../util/platform.js'
import type { PreflightCheck, PreflightResult } from './types.js'

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Override the platform detection (useful for testing). */
  platform?: Platform | undefined
  /** gpg binary to check. Defaults to `gpg`. */
  binary?: string | undefined
}

/** A doctor check entry pairing the check function with whether it is required. */
interface CheckEntry {
  check: () => Promise<PreflightCheck>
  required: boolean
}

/** Aggregated check entry with its result. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

/**
 * Run all platform-appropriate preflight checks and aggregate the results.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const platform = options?.platform ?? currentPlatform()

  const entries = buildCheckList(platform, options?.binary)

  const resolved: ResolvedEntry[] = await Promise.all(
    entries.map(async ({ check, required }) => {
      const result = await check()
      return { required, result }
    }),
  )

  const ready = resolved.every(({ required, result }) => !required || result.status === 'ok')

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    const detail = result.reason !== undefined ? `: ${result.reason}` : ''
    if (result.status === 'missing') {
      if (required) {
        nextSteps.push(`Install missing required dependency: ${result.name}`)
      } else {
        warnings.push(`Optional dependency not found: ${result.name}${detail}`)
      }
    } else if (result.status === 'version-unsupported') {
      const msg = `${result.name} version is unsupported${detail}`
      if (required) {
        nextSteps.push(`Upgrade required dependency: ${msg}`)
      } else {
        warnings.push(`Optional dependency version unsupported: ${msg}`)
      }
    }
  }

  const checks = resolved.map(({ required, result }) => ({ ...result, required }))

  return { checks, ready, warnings, nextSteps }
}

function buildCheckList(platform: Platform, binary: string | undefined): CheckEntry[] {
  const entries: CheckEntry[] = [{ check: () => checkGpg(binary), required: true }]

  if (platform === 'win32') {
    entries.push({ check: checkPowershell, required: false })
  }

  return entries
}
