import { ConfigurationError, SecretRetrievalError } from '../errors.js'
import { requireRawSetting, requireSetting } from '../settings.js'
import type { Role, RuntimeSettings } from '../types.js'
import type { PassphraseMode } from './types.js'

/**
 * Read a setting a resolver depends on, reporting absence as a secret
 * retrieval failure for `role`.
 *
 * @remarks
 * Pass `raw` for key material such as `entropy`, whose surrounding
 * whitespace is part of the value.
 * @internal
 */
export function requireSecretSetting(
  settings: RuntimeSettings,
  key: string,
  role: Role,
  mode: PassphraseMode,
  options: { raw?: boolean } = {},
): string {
  try {
    return options.raw === true ? requireRawSetting(settings, key) : requireSetting(settings, key)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new SecretRetrievalError(
        `Cannot resolve the ${role}'s passphrase with ${mode}: ${key} not configured`,
        role,
        mode,
        { cause: error },
      )
    }
    throw error
  }
}
