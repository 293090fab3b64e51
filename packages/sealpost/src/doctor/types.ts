/**
 * Preflight check types.
 */

/** Status of a single preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing' | 'version-unsupported'

/** Result of checking one external program. */
export interface PreflightCheck {
  /** Program name, e.g. `gpg`. */
  name: string
  status: PreflightCheckStatus
  /** First line of the program's version output, when it ran. */
  version?: string | undefined
  /** Why the status is not `'ok'`. */
  reason?: string | undefined
}

/** A check as reported by the doctor, with whether sealpost cannot run without it. */
export interface DoctorCheck extends PreflightCheck {
  required: boolean
}

/** Aggregated result of all preflight checks. */
export interface PreflightResult {
  checks: DoctorCheck[]
  /** `true` when every required check passed. */
  ready: boolean
  /** Problems with optional programs. */
  warnings: string[]
  /** What to fix before the workflow can run. */
  nextSteps: string[]
}
