/**
 * Contract of the external OpenPGP engine.
 */

import type { PassphraseCallback } from '../passphrase/types.js'
import type { EncryptionOutcome, EngineInfo, KeyRecord, VerificationOutcome } from '../types.js'

/** Options for listing keys. */
export interface ListKeysOptions {
  /** List only keys whose secret part is available. */
  secretOnly?: boolean | undefined
}

/** Request to encrypt a file for recipients and sign it. */
export interface EncryptAndSignRequest {
  /** Primary fingerprints of the recipient keys. */
  recipients: string[]
  /** Primary fingerprint of the signing key. */
  signer: string
  inputPath: string
  outputPath: string
  /** Encrypt even if the recipient keys are not fully valid locally. */
  alwaysTrust: boolean
  /** Supplies the signer's passphrase when the engine asks for it. */
  passphrase: PassphraseCallback
}

/** Request to decrypt a file and verify its embedded signatures. */
export interface DecryptAndVerifyRequest {
  inputPath: string
  outputPath: string
  /** Supplies the recipient's passphrase when the engine asks for it. */
  passphrase: PassphraseCallback
}

/**
 * The OpenPGP primitives sealpost relies on.
 *
 * @remarks
 * An engine instance must not be shared by concurrent operations that bind
 * different passphrase callbacks.
 *
 * @public
 */
export interface OpenPgpEngine {
  getEngineInfo(): Promise<EngineInfo>

  /**
   * List keys whose user ids match any of `patterns`, including their
   * certifications.
   */
  listKeys(patterns: string[], options?: ListKeysOptions): Promise<KeyRecord[]>

  /**
   * Encrypt and sign `inputPath` into `outputPath`.
   * @throws EngineError if the engine fails for a reason other than rejected
   * recipients
   */
  encryptAndSign(request: EncryptAndSignRequest): Promise<EncryptionOutcome>

  /**
   * Decrypt `inputPath` into `outputPath` and verify signatures.
   * @throws EngineError if the engine fails outright
   */
  decryptAndVerify(request: DecryptAndVerifyRequest): Promise<VerificationOutcome>
}
