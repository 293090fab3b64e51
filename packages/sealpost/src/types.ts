/**
 * Shared types and interfaces for sealpost.
 */

/** Which side of the exchange an identity, key or passphrase belongs to. */
export type Role = 'Sender' | 'Recipient'

/** Both roles, in the order settings keys are documented. */
export const ROLES: readonly Role[] = ['Sender', 'Recipient']

/**
 * Flat, string-keyed runtime configuration supplied once at startup.
 * Keys are case-sensitive.
 */
export type RuntimeSettings = Readonly<Record<string, string>>

/** An engine-reported certification on a key (from a signature listing). */
export interface KeySignature {
  /** Long key id of the issuer. */
  issuerKeyId: string
  /** User id of the issuer, when the engine knows it. */
  issuerUserId?: string | undefined
  createdAt?: Date | undefined
  /** Two hex digits plus `x`/`l`, e.g. `13x`. */
  signatureClass: string
}

/**
 * A key retrieved from the engine's keystore.
 *
 * @remarks
 * `fingerprints[0]` is the primary key fingerprint and doubles as the handle
 * passed back to the engine; the remaining entries are subkey fingerprints in
 * the order the engine lists them.
 */
export interface KeyRecord {
  /** Long key id of the primary key. */
  keyId: string
  /** Email of the primary user id, or `undefined` when it carries none. */
  email: string | undefined
  /** All user id strings, primary first. */
  userIds: string[]
  fingerprints: string[]
  /** Whether the secret part of the key is available in the keystore. */
  hasSecret: boolean
  signatures: KeySignature[]
}

/** Information about the engine installation, logged at startup. */
export interface EngineInfo {
  fileName: string
  version: string
  homeDir?: string | undefined
}

/** A recipient or signer the engine rejected. */
export interface InvalidKey {
  fingerprint: string
  reason: string
}

/** Result of an encrypt-and-sign attempt. */
export interface EncryptionOutcome {
  invalidRecipients: InvalidKey[]
  invalidSigners: InvalidKey[]
  signaturesCreated: number
  success: boolean
}

/** A key the ciphertext was encrypted to. */
export interface DecryptionRecipient {
  keyId: string
  algorithm: string
}

/**
 * Summary flags for a signature.
 *
 * @remarks
 * `valid` means the signature is good and the key is fully (or ultimately)
 * valid; `green` accompanies it. `red` means the signature is bad or the key
 * is known not to be trusted.
 */
export type SignatureSummaryFlag =
  | 'valid'
  | 'green'
  | 'red'
  | 'key-revoked'
  | 'key-expired'
  | 'sig-expired'
  | 'key-missing'

/** Validity the engine assigns to the signing key. */
export type Validity = 'unknown' | 'undefined' | 'never' | 'marginal' | 'full' | 'ultimate'

/** A verified (or failed) signature found while decrypting. */
export interface SignatureRecord {
  /** Fingerprint of the signing key or subkey; a long key id when unknown. */
  fingerprint: string
  hashAlgorithm: string
  keyAlgorithm: string
  timestamp: Date | undefined
  summary: SignatureSummaryFlag[]
  validity: Validity
}

/** Result of a decrypt-and-verify attempt. */
export interface VerificationOutcome {
  /** Whether the engine reported the plaintext was fully decrypted. */
  decrypted: boolean
  recipients: DecryptionRecipient[]
  signatures: SignatureRecord[]
}

/** Whether a decrypted file may be released. */
export interface AuthenticationDecision {
  authenticated: boolean
  /** Number of valid, fully trusted signatures made by the sender key. */
  matchCount: number
}
