/**
 * Individual preflight check functions for each system dependency.
 */

import { errorMessage } from '../logger.js'
import { execCommand } from '../util/exec.js'
import type { PreflightCheck } from './types.js'

type Version = [number, number, number]

/**
 * Parse a semver-like version string and return [major, minor, patch].
 * Returns null if unparseable.
 */
function parseVersion(raw: string): Version | null {
  const match = /(\d+)\.(\d+)(?:\.(\d+))?/.exec(raw)
  if (!match) return null
  const major = parseInt(match[1] ?? '0', 10)
  const minor = parseInt(match[2] ?? '0', 10)
  const patch = parseInt(match[3] ?? '0', 10)
  return [major, minor, patch]
}

/**
 * Returns true if [aMajor, aMinor, aPatch] >= [bMajor, bMinor, bPatch].
 */
function versionGte(a: Version, b: Version): boolean {
  if (a[0] !== b[0]) return a[0] > b[0]
  if (a[1] !== b[1]) return a[1] > b[1]
  return a[2] >= b[2]
}

// Loopback pinentry, which answers passphrase prompts without a terminal.
const MIN_GPG_VERSION: Version = [2, 1, 0]

/**
 * Check that gpg is present and supports loopback pinentry (>= 2.1.0).
 * @internal
 */
export async function checkGpg(binary = 'gpg'): Promise<PreflightCheck> {
  const name = 'gpg'
  let output: string
  try {
    output = await execCommand(binary, ['--version'])
  } catch (error) {
    return { name, status: 'missing', reason: `${binary} not found in PATH (${errorMessage(error)})` }
  }

  const firstLine = output.split('\n')[0] ?? output
  const parsed = parseVersion(firstLine)
  if (!parsed) {
    return {
      name,
      status: 'version-unsupported',
      version: firstLine,
      reason: 'Could not parse gpg version',
    }
  }
  if (!versionGte(parsed, MIN_GPG_VERSION)) {
    return {
      name,
      status: 'version-unsupported',
      version: firstLine,
      reason: 'gpg >= 2.1.0 is required for loopback pinentry',
    }
  }
  return { name, status: 'ok', version: firstLine }
}

/**
 * Check that PowerShell is present (Windows only, used for DPAPI).
 * @internal
 */
export async function checkPowershell(): Promise<PreflightCheck> {
  const name = 'powershell'
  try {
    const output = await execCommand('powershell', [
      '-NoProfile',
      '-Command',
      '$PSVersionTable.PSVersion.ToString()',
    ])
    return { name, status: 'ok', version: output.trim() }
  } catch (error) {
    return {
      name,
      status: 'missing',
      reason: `powershell not found in PATH (${errorMessage(error)}); WINDOWS_DPAPI needs it`,
    }
  }
}
