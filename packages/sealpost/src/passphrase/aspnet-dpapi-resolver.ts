/**
 * Certificate-backed data protection passphrase resolver (the default mode).
 *
 * @remarks
 * The passphrase is stored as a base64 payload protected by an ASP.NET Core
 * Data Protection key ring whose keys are encrypted to the X.509 certificate
 * named by `SSLCertDistinguishedSubjectName`; the `entropy` setting is the
 * protector purpose. The key ring format belongs to .NET, so unprotecting is
 * delegated to a helper command (`AspNetDpapiHelperCommand`).
 */

import { SecretRetrievalError } from '../errors.js'
import { errorMessage } from '../logger.js'
import { SettingKeys, aspNetDpapiSecretKey, optionalSetting } from '../settings.js'
import type { Role, RuntimeSettings } from '../types.js'
import { execCommand } from '../util/exec.js'
import { requireSecretSetting } from './settings.js'
import type { AspNetDpapiUnwrapper, PassphraseResolver, PassphraseResolverDeps } from './types.js'

/** Helper command used when `AspNetDpapiHelperCommand` is not set. */
export const DEFAULT_ASPNET_DPAPI_HELPER = 'aspnet-dpapi-unprotect'

/**
 * {@link AspNetDpapiUnwrapper} that runs a helper command.
 *
 * @remarks
 * The helper is invoked as `<command> unprotect`, reads a JSON request
 * `{ protectedPayload, purpose, certificateSubjectName }` on stdin and writes
 * the base64 of the unprotected bytes (UTF-16LE text) on stdout.
 *
 * @internal
 */
export class HelperCommandUnwrapper implements AspNetDpapiUnwrapper {
  readonly #command: string

  constructor(command: string = DEFAULT_ASPNET_DPAPI_HELPER) {
    this.#command = command
  }

  async unprotect(cipherText: string, purpose: string, certificateSubjectName: string): Promise<string> {
    const output = await execCommand(this.#command, ['unprotect'], {
      stdin: JSON.stringify({ protectedPayload: cipherText, purpose, certificateSubjectName }),
    })
    return Buffer.from(output, 'base64').toString('utf16le')
  }
}

/**
 * Passphrase resolver for `ASPNET_DPAPI`.
 * @public
 */
export class AspNetDpapiResolver implements PassphraseResolver {
  readonly mode = 'ASPNET_DPAPI'
  readonly displayName = 'ASP.NET Core Data Protection API'
  readonly #unwrapper: AspNetDpapiUnwrapper | undefined

  constructor(deps: PassphraseResolverDeps = {}) {
    this.#unwrapper = deps.aspNetDpapi
  }

  async resolve(role: Role, settings: RuntimeSettings): Promise<string> {
    const cipherText = requireSecretSetting(settings, aspNetDpapiSecretKey(role), role, this.mode)
    const purpose = requireSecretSetting(settings, SettingKeys.entropy, role, this.mode, {
      raw: true,
    })
    const subject = requireSecretSetting(
      settings,
      SettingKeys.certificateSubjectName,
      role,
      this.mode,
    )
    const unwrapper =
      this.#unwrapper ??
      new HelperCommandUnwrapper(optionalSetting(settings, SettingKeys.aspNetDpapiHelper))

    try {
      return await unwrapper.unprotect(cipherText, purpose, subject)
    } catch (error) {
      throw new SecretRetrievalError(
        `Failed to decrypt the ${role}'s passphrase with ASP.NET Core Data Protection: ${errorMessage(error)}`,
        role,
        this.mode,
        { cause: error },
      )
    }
  }
}
