/**
 * Windows DPAPI passphrase resolver.
 *
 * @remarks
 * The passphrase is stored in the settings as a base64 blob produced by
 * `ProtectedData.Protect` for the current user, with the UTF-16LE bytes of
 * the `entropy` setting as additional entropy. Only works on Windows.
 */

import { SecretRetrievalError } from '../errors.js'
import { errorMessage } from '../logger.js'
import { SettingKeys, windowsDpapiSecretKey } from '../settings.js'
import type { Role, RuntimeSettings } from '../types.js'
import { execCommand } from '../util/exec.js'
import { isWindows } from '../util/platform.js'
import { requireSecretSetting } from './settings.js'
import type { PassphraseResolver, PassphraseResolverDeps, WindowsDpapiUnwrapper } from './types.js'

// Input arrives as JSON on stdin so neither value is interpolated into the
// script. Output is base64 of the raw plaintext bytes (UTF-16LE).
const UNPROTECT_SCRIPT = [
  'Add-Type -AssemblyName System.Security',
  '$request = [Console]::In.ReadToEnd() | ConvertFrom-Json',
  '$cipher = [System.Convert]::FromBase64String($request.cipherText)',
  '$entropy = [System.Text.Encoding]::Unicode.GetBytes($request.entropy)',
  '$scope = [System.Security.Cryptography.DataProtectionScope]::CurrentUser',
  '$bytes = [System.Security.Cryptography.ProtectedData]::Unprotect($cipher, $entropy, $scope)',
  '[Console]::Out.Write([System.Convert]::ToBase64String($bytes))',
].join('; ')

/**
 * {@link WindowsDpapiUnwrapper} that runs `ProtectedData.Unprotect` through
 * PowerShell.
 *
 * @internal
 */
export class PowerShellDpapiUnwrapper implements WindowsDpapiUnwrapper {
  async unprotect(cipherText: string, entropy: string): Promise<string> {
    if (!isWindows()) {
      throw new Error('Windows DPAPI is only available on Windows')
    }
    const output = await execCommand(
      'powershell',
      ['-NoProfile', '-NonInteractive', '-Command', UNPROTECT_SCRIPT],
      { stdin: JSON.stringify({ cipherText, entropy }) },
    )
    return Buffer.from(output, 'base64').toString('utf16le')
  }
}

/**
 * Passphrase resolver for `WINDOWS_DPAPI`.
 * @public
 */
export class WindowsDpapiResolver implements PassphraseResolver {
  readonly mode = 'WINDOWS_DPAPI'
  readonly displayName = 'Windows Data Protection API'
  readonly #unwrapper: WindowsDpapiUnwrapper

  constructor(deps: PassphraseResolverDeps = {}) {
    this.#unwrapper = deps.windowsDpapi ?? new PowerShellDpapiUnwrapper()
  }

  async resolve(role: Role, settings: RuntimeSettings): Promise<string> {
    const cipherText = requireSecretSetting(settings, windowsDpapiSecretKey(role), role, this.mode)
    const entropy = requireSecretSetting(settings, SettingKeys.entropy, role, this.mode, {
      raw: true,
    })

    try {
      return await this.#unwrapper.unprotect(cipherText, entropy)
    } catch (error) {
      throw new SecretRetrievalError(
        `Failed to decrypt the ${role}'s passphrase with Windows DPAPI: ${errorMessage(error)}`,
        role,
        this.mode,
        { cause: error },
      )
    }
  }
}
