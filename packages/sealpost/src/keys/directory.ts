/**
 * Binding of keystore keys to the configured sender and recipient.
 */

import { InvalidKeyError, KeyNotConfiguredError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { KeyRecord, Role } from '../types.js'

/** Keys bound to each role; a role no key matched is `undefined`. */
export interface RoleKeys {
  senderKey: KeyRecord | undefined
  recipientKey: KeyRecord | undefined
}

function normalizeFingerprint(value: string): string {
  return value.replace(/\s+/g, '').toUpperCase()
}

/**
 * Resolves which keystore key belongs to which role and checks signature
 * fingerprints against the sender key.
 *
 * @public
 */
export class KeyDirectory {
  readonly #logger: Logger
  #keys: RoleKeys = { senderKey: undefined, recipientKey: undefined }

  constructor(logger?: Logger) {
    this.#logger = logger ?? createLogger('sealpost').child({ component: 'key-directory' })
  }

  /**
   * Bind candidate keys to the sender and recipient emails.
   *
   * @remarks
   * The first key whose primary user id email equals an identity exactly is
   * bound to that role; later matches are ignored. One key may fill both
   * roles. A role nothing matched stays unbound and only fails when an
   * operation needs it ({@link KeyDirectory.requireKey}).
   *
   * @throws {@link InvalidKeyError} if a candidate carries no user id email
   */
  initialize(sender: string, recipient: string, candidates: readonly KeyRecord[]): RoleKeys {
    let senderKey: KeyRecord | undefined
    let recipientKey: KeyRecord | undefined

    for (const key of candidates) {
      if (key.email === undefined) {
        throw new InvalidKeyError(`Key [${key.keyId}] has no user id email`, key.keyId)
      }
      if (recipientKey === undefined && key.email === recipient) {
        recipientKey = key
        this.#logger.info({ keyId: key.keyId, email: key.email }, 'Recipient key found')
      }
      if (senderKey === undefined && key.email === sender) {
        senderKey = key
        this.#logger.info({ keyId: key.keyId, email: key.email }, 'Sender key found')
      }
    }

    if (senderKey === undefined) {
      this.#logger.warn({ email: sender }, 'No key found for the sender')
    }
    if (recipientKey === undefined) {
      this.#logger.warn({ email: recipient }, 'No key found for the recipient')
    }

    this.#keys = { senderKey, recipientKey }
    return this.#keys
  }

  /**
   * Return the key bound to `role`.
   * @throws {@link KeyNotConfiguredError} if no key was bound to it
   */
  requireKey(role: Role): KeyRecord {
    const key = role === 'Sender' ? this.#keys.senderKey : this.#keys.recipientKey
    if (key === undefined) {
      throw new KeyNotConfiguredError(`${role} key not configured`, role)
    }
    return key
  }

  /**
   * Check whether `candidate` is the primary or first subkey fingerprint of
   * `key`. Comparison ignores case and whitespace; later subkeys never
   * match.
   */
  verifyThumbprint(key: KeyRecord, candidate: string): boolean {
    const wanted = normalizeFingerprint(candidate)
    if (wanted === '') {
      return false
    }
    const known = key.fingerprints.slice(0, 2)
    for (const [index, fingerprint] of known.entries()) {
      const matched = normalizeFingerprint(fingerprint) === wanted
      this.#logger.debug(
        { keyId: key.keyId, fingerprint, candidate, index, matched },
        'Thumbprint comparison',
      )
      if (matched) {
        return true
      }
    }
    return false
  }
}
