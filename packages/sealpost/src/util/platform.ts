/**
 * Platform detection utilities.
 */

/**
 * Platforms the doctor knows how to check.
 * @internal
 */
export type Platform = 'darwin' | 'win32' | 'linux'

/** Get the current platform. */
export function currentPlatform(): Platform {
  const p = process.platform
  if (p === 'darwin' || p === 'win32' || p === 'linux') {
    return p
  }
  throw new Error(`Unsupported platform: ${p}`)
}

/** Check if running on Windows, where the DPAPI unwrapper works. */
export function isWindows(): boolean {
  return process.platform === 'win32'
}
