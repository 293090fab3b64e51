/**
 * Doctor (preflight) public API.
 *
 * @packageDocumentation
 */

export { runDoctor } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export { checkGpg, checkPowershell } from './checks.js'
export type { PreflightCheckStatus, PreflightCheck, DoctorCheck, PreflightResult } from './types.js'
