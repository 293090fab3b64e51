/**
 * Passphrase resolution types for sealpost.
 */

import type { Logger } from '../logger.js'
import type { Role, RuntimeSettings } from '../types.js'

/** Every supported passphrase protection mode. */
export const PASSPHRASE_MODES = ['AWS_SECRETSMANAGER', 'WINDOWS_DPAPI', 'ASPNET_DPAPI'] as const

/**
 * How the role passphrases are protected at rest.
 * @public
 */
export type PassphraseMode = (typeof PASSPHRASE_MODES)[number]

/**
 * Returns the plaintext passphrase of a role from one secret backend.
 *
 * @remarks
 * Implementations hold no mutable state, so one instance may serve
 * concurrent resolutions for independent roles.
 *
 * @public
 */
export interface PassphraseResolver {
  readonly mode: PassphraseMode

  /** Human-readable backend name for log output. */
  readonly displayName: string

  /**
   * Resolve the passphrase of `role`.
   * @throws SecretRetrievalError if required settings are absent or the
   * backend call fails
   */
  resolve(role: Role, settings: RuntimeSettings): Promise<string>
}

/**
 * Fetches a secret string from a remote secrets service by name.
 * @public
 */
export interface SecretFetcher {
  getSecretString(name: string): Promise<string>
}

/**
 * Unwraps a base64 ciphertext protected for the current Windows user.
 * @public
 */
export interface WindowsDpapiUnwrapper {
  unprotect(cipherText: string, entropy: string): Promise<string>
}

/**
 * Unwraps a base64 payload protected with a certificate-backed data
 * protection key ring.
 * @public
 */
export interface AspNetDpapiUnwrapper {
  unprotect(cipherText: string, purpose: string, certificateSubjectName: string): Promise<string>
}

/**
 * Collaborators a resolver may use. Anything left out is created from the
 * runtime settings when first needed.
 * @public
 */
export interface PassphraseResolverDeps {
  secretFetcher?: SecretFetcher | undefined
  windowsDpapi?: WindowsDpapiUnwrapper | undefined
  aspNetDpapi?: AspNetDpapiUnwrapper | undefined
  logger?: Logger | undefined
}

/**
 * Factory function for creating the resolver of one mode.
 * @public
 */
export type PassphraseResolverFactory = (deps: PassphraseResolverDeps) => PassphraseResolver

/**
 * Supplies a passphrase to the engine. Invoked at most once per engine
 * operation, and only when the engine asks for one.
 * @public
 */
export type PassphraseCallback = () => Promise<string>
