/**
 * Passphrase resolution barrel export.
 */

export type {
  PassphraseMode,
  PassphraseResolver,
  PassphraseResolverDeps,
  PassphraseResolverFactory,
  PassphraseCallback,
  SecretFetcher,
  WindowsDpapiUnwrapper,
  AspNetDpapiUnwrapper,
} from './types.js'
export { PASSPHRASE_MODES } from './types.js'
export {
  DEFAULT_PASSPHRASE_MODE,
  parsePassphraseMode,
  createPassphraseResolver,
  resolvePassphrase,
} from './registry.js'
export {
  AwsSecretsManagerResolver,
  createAwsSecretFetcher,
  SECRET_PASSPHRASE_FIELD,
} from './aws-secrets-manager-resolver.js'
export type { AwsSecretFetcherOptions } from './aws-secrets-manager-resolver.js'
export { WindowsDpapiResolver, PowerShellDpapiUnwrapper } from './windows-dpapi-resolver.js'
export {
  AspNetDpapiResolver,
  HelperCommandUnwrapper,
  DEFAULT_ASPNET_DPAPI_HELPER,
} from './aspnet-dpapi-resolver.js'
