/**
 * Selection of the passphrase resolver for the configured protection mode.
 *
 * @remarks
 * The set of modes is closed: {@link PASSPHRASE_MODES} lists them and the
 * factory table below must name a factory for each, so adding a mode without
 * a resolver fails to compile.
 */

import { SecretRetrievalError } from '../errors.js'
import { SettingKeys, optionalSetting } from '../settings.js'
import type { Role, RuntimeSettings } from '../types.js'
import { AspNetDpapiResolver } from './aspnet-dpapi-resolver.js'
import { AwsSecretsManagerResolver } from './aws-secrets-manager-resolver.js'
import { WindowsDpapiResolver } from './windows-dpapi-resolver.js'
import { PASSPHRASE_MODES } from './types.js'
import type {
  PassphraseMode,
  PassphraseResolver,
  PassphraseResolverDeps,
  PassphraseResolverFactory,
} from './types.js'

/** Mode used when `PassphraseProtectionMode` is absent or not recognised. */
export const DEFAULT_PASSPHRASE_MODE: PassphraseMode = 'ASPNET_DPAPI'

const factories: { readonly [M in PassphraseMode]: PassphraseResolverFactory } = {
  AWS_SECRETSMANAGER: (deps) => new AwsSecretsManagerResolver(deps),
  WINDOWS_DPAPI: (deps) => new WindowsDpapiResolver(deps),
  ASPNET_DPAPI: (deps) => new AspNetDpapiResolver(deps),
}

function isPassphraseMode(value: string): value is PassphraseMode {
  return PASSPHRASE_MODES.some((mode) => mode === value)
}

/**
 * Normalise a `PassphraseProtectionMode` setting value.
 *
 * @remarks
 * Matching ignores case and surrounding whitespace. Absent, blank and
 * unrecognised values select {@link DEFAULT_PASSPHRASE_MODE}.
 */
export function parsePassphraseMode(raw: string | undefined): PassphraseMode {
  const normalized = (raw ?? '').trim().toUpperCase()
  return isPassphraseMode(normalized) ? normalized : DEFAULT_PASSPHRASE_MODE
}

/**
 * Create the resolver for a mode.
 */
export function createPassphraseResolver(
  mode: PassphraseMode,
  deps: PassphraseResolverDeps = {},
): PassphraseResolver {
  return factories[mode](deps)
}

/**
 * Resolve the passphrase of `role` with the mode configured in `settings`.
 *
 * @throws {@link SecretRetrievalError} if the mode's settings are absent or
 * its backend fails
 */
export async function resolvePassphrase(
  role: Role,
  settings: RuntimeSettings,
  deps: PassphraseResolverDeps = {},
): Promise<string> {
  const mode = parsePassphraseMode(optionalSetting(settings, SettingKeys.passphraseProtectionMode))
  const resolver = createPassphraseResolver(mode, deps)
  deps.logger?.debug({ role, mode }, `Fetching ${role}'s secret passphrase from ${resolver.displayName}`)

  const passphrase = await resolver.resolve(role, settings)
  if (passphrase === '') {
    throw new SecretRetrievalError(`${resolver.displayName} returned an empty passphrase`, role, mode)
  }
  deps.logger?.debug({ role, mode }, `Fetched ${role}'s secret passphrase`)
  return passphrase
}
