/**
 * In-memory OpenPGP engine for testing.
 */

import { createHash } from 'node:crypto'
import * as fs from 'node:fs/promises'
import { EngineError, extractEmail } from 'sealpost'
import type {
  DecryptAndVerifyRequest,
  DecryptionRecipient,
  EncryptAndSignRequest,
  EncryptionOutcome,
  EngineInfo,
  InvalidKey,
  KeyRecord,
  ListKeysOptions,
  OpenPgpEngine,
  SignatureRecord,
  SignatureSummaryFlag,
  Validity,
  VerificationOutcome,
} from 'sealpost'

/** Marker of the envelope format written by {@link InMemoryEngine}. */
export const TEST_MESSAGE_TYPE = 'sealpost-test-message'

/**
 * A key to add to an {@link InMemoryEngine} keystore.
 * @public
 */
export interface TestKeyOptions {
  /** Email of the user id. Ignored when `userId` is given. */
  email?: string | undefined
  /** Full user id; defaults to `Test User <email>`. */
  userId?: string | undefined
  /** Passphrase protecting the secret key. */
  passphrase?: string | undefined
  /** Whether the secret part is in the keystore. Defaults to `true`. */
  secret?: boolean | undefined
  /** Number of subkeys. Defaults to 1. */
  subkeys?: number | undefined
  /** Index into the fingerprints of the (sub)key that makes signatures. Defaults to 0. */
  signingKeyIndex?: number | undefined
  /** Validity of the key as seen by the verifier. Defaults to `full`. */
  validity?: Validity | undefined
  /** Revoked keys are rejected as recipients. */
  revoked?: boolean | undefined
}

interface StoredKey {
  record: KeyRecord
  passphrase: string
  signingKeyIndex: number
  validity: Validity
  revoked: boolean
}

interface TestSignature {
  fingerprint: string
  created: string
  digest: string
}

interface TestMessage {
  type: typeof TEST_MESSAGE_TYPE
  recipients: string[]
  payload: string
  signature?: TestSignature | undefined
}

/** Options for {@link InMemoryEngine.createMessage}. */
export interface CreateMessageOptions {
  plaintext: string | Buffer
  /** Fingerprints the message is encrypted to. */
  recipients: string[]
  /** Fingerprint that signed the message; unsigned when omitted. */
  signedBy?: string | undefined
}

function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function parseSignature(value: unknown): TestSignature | undefined {
  if (!isRecord(value)) return undefined
  const { fingerprint, created, digest } = value
  if (typeof fingerprint !== 'string' || typeof created !== 'string' || typeof digest !== 'string') {
    return undefined
  }
  return { fingerprint, created, digest }
}

function parseMessage(text: string): TestMessage | undefined {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return undefined
  }
  if (!isRecord(parsed) || parsed.type !== TEST_MESSAGE_TYPE) return undefined
  const { recipients, payload } = parsed
  if (!isStringArray(recipients) || typeof payload !== 'string') return undefined
  return { type: TEST_MESSAGE_TYPE, recipients, payload, signature: parseSignature(parsed.signature) }
}

function keyIdOf(fingerprint: string): string {
  return fingerprint.slice(-16)
}

/**
 * A fully in-memory {@link OpenPgpEngine} for testing.
 *
 * @remarks
 * Messages are JSON envelopes: the payload is only base64 encoded and the
 * "signature" is a SHA-256 digest of the plaintext bound to a fingerprint.
 * Keys, passphrases and validities are configured directly, so tests can
 * exercise every verification outcome without a real keystore.
 *
 * @public
 */
export class InMemoryEngine implements OpenPgpEngine {
  readonly #keys: StoredKey[] = []
  #counter = 0

  /** Add a key and return its record. */
  addKey(options: TestKeyOptions): KeyRecord {
    this.#counter++
    const seed = `test-key-${String(this.#counter)}`
    const subkeys = options.subkeys ?? 1
    const fingerprints = Array.from({ length: subkeys + 1 }, (_, index) =>
      createHash('sha1').update(`${seed}:${String(index)}`).digest('hex').toUpperCase(),
    )
    const userId =
      options.userId ?? (options.email !== undefined ? `Test User <${options.email}>` : undefined)
    const primary = fingerprints[0] ?? seed
    const record: KeyRecord = {
      keyId: keyIdOf(primary),
      email: userId !== undefined ? extractEmail(userId) : undefined,
      userIds: userId !== undefined ? [userId] : [],
      fingerprints,
      hasSecret: options.secret ?? true,
      signatures: [{ issuerKeyId: keyIdOf(primary), signatureClass: '13x' }],
    }
    this.#keys.push({
      record,
      passphrase: options.passphrase ?? '',
      signingKeyIndex: options.signingKeyIndex ?? 0,
      validity: options.validity ?? 'full',
      revoked: options.revoked ?? false,
    })
    return structuredClone(record)
  }

  /** Change the validity the verifier assigns to a key. */
  setValidity(fingerprint: string, validity: Validity): void {
    this.#require(fingerprint).validity = validity
  }

  /** Build an envelope without going through {@link InMemoryEngine.encryptAndSign}. */
  createMessage(options: CreateMessageOptions): string {
    const plaintext =
      typeof options.plaintext === 'string' ? Buffer.from(options.plaintext, 'utf-8') : options.plaintext
    const message: TestMessage = {
      type: TEST_MESSAGE_TYPE,
      recipients: options.recipients,
      payload: plaintext.toString('base64'),
      signature:
        options.signedBy !== undefined
          ? {
              fingerprint: options.signedBy,
              created: new Date().toISOString(),
              digest: sha256(plaintext),
            }
          : undefined,
    }
    return JSON.stringify(message, null, 2)
  }

  getEngineInfo(): Promise<EngineInfo> {
    return Promise.resolve({ fileName: 'in-memory', version: '0.0.0-test' })
  }

  listKeys(patterns: string[], options?: ListKeysOptions): Promise<KeyRecord[]> {
    const wanted = patterns.map((pattern) => pattern.toLowerCase())
    const matches = this.#keys
      .filter(({ record }) => options?.secretOnly !== true || record.hasSecret)
      .filter(
        ({ record }) =>
          wanted.length === 0 ||
          wanted.some(
            (pattern) =>
              record.userIds.some((userId) => userId.toLowerCase().includes(pattern)) ||
              record.fingerprints.some((fpr) => fpr.toLowerCase() === pattern),
          ),
      )
      .map(({ record }) => structuredClone(record))
    return Promise.resolve(matches)
  }

  async encryptAndSign(request: EncryptAndSignRequest): Promise<EncryptionOutcome> {
    const invalidRecipients: InvalidKey[] = []
    for (const fingerprint of request.recipients) {
      const key = this.#find(fingerprint)
      if (key === undefined) {
        invalidRecipients.push({ fingerprint, reason: 'Not Found' })
      } else if (key.revoked) {
        invalidRecipients.push({ fingerprint, reason: 'Key revoked' })
      }
    }
    const signer = this.#find(request.signer)
    const invalidSigners: InvalidKey[] =
      signer?.record.hasSecret === true
        ? []
        : [{ fingerprint: request.signer, reason: 'Not a secret key' }]

    if (signer === undefined || invalidRecipients.length > 0 || invalidSigners.length > 0) {
      return { invalidRecipients, invalidSigners, signaturesCreated: 0, success: false }
    }

    const passphrase = await request.passphrase()
    if (passphrase !== signer.passphrase) {
      throw new EngineError('Bad passphrase', 'encrypt-sign', 2, 'signing failed: Bad passphrase')
    }

    const plaintext = await this.#read(request.inputPath, 'encrypt-sign')
    const message = this.createMessage({
      plaintext,
      recipients: request.recipients,
      signedBy: signer.record.fingerprints[signer.signingKeyIndex] ?? request.signer,
    })
    await fs.writeFile(request.outputPath, message)
    return { invalidRecipients, invalidSigners, signaturesCreated: 1, success: true }
  }

  async decryptAndVerify(request: DecryptAndVerifyRequest): Promise<VerificationOutcome> {
    const text = (await this.#read(request.inputPath, 'decrypt-verify')).toString('utf-8')
    const message = parseMessage(text)
    if (message === undefined) {
      throw new EngineError('no valid OpenPGP data found', 'decrypt-verify', 2, 'no valid OpenPGP data found')
    }

    const secretKeys = message.recipients
      .map((fingerprint) => this.#find(fingerprint))
      .filter((key): key is StoredKey => key?.record.hasSecret === true)
    if (secretKeys.length === 0) {
      throw new EngineError('decryption failed: No secret key', 'decrypt-verify', 2, 'decryption failed: No secret key')
    }

    const passphrase = await request.passphrase()
    if (!secretKeys.some((key) => key.passphrase === passphrase)) {
      throw new EngineError('decryption failed: Bad passphrase', 'decrypt-verify', 2, 'Bad passphrase')
    }

    const plaintext = Buffer.from(message.payload, 'base64')
    await fs.writeFile(request.outputPath, plaintext)

    const recipients: DecryptionRecipient[] = message.recipients.map((fingerprint) => ({
      keyId: keyIdOf(fingerprint),
      algorithm: 'ECDH',
    }))
    const signatures =
      message.signature !== undefined ? [this.#verify(message.signature, plaintext)] : []
    return { decrypted: true, recipients, signatures }
  }

  #verify(signature: TestSignature, plaintext: Buffer): SignatureRecord {
    const created = new Date(signature.created)
    const timestamp = Number.isNaN(created.getTime()) ? undefined : created
    const signer = this.#find(signature.fingerprint)
    if (signer === undefined) {
      return {
        fingerprint: signature.fingerprint,
        hashAlgorithm: 'SHA256',
        keyAlgorithm: 'unknown',
        timestamp,
        summary: ['key-missing'],
        validity: 'unknown',
      }
    }

    const good = signature.digest === sha256(plaintext)
    const summary: SignatureSummaryFlag[] = []
    if (good && (signer.validity === 'full' || signer.validity === 'ultimate')) {
      summary.push('valid', 'green')
    }
    if (!good || signer.validity === 'never') {
      summary.push('red')
    }
    return {
      fingerprint: signature.fingerprint,
      hashAlgorithm: 'SHA256',
      keyAlgorithm: 'EdDSA',
      timestamp,
      summary,
      validity: signer.validity,
    }
  }

  async #read(filePath: string, operation: 'encrypt-sign' | 'decrypt-verify'): Promise<Buffer> {
    try {
      return await fs.readFile(filePath)
    } catch (error) {
      throw new EngineError(`can't open '${filePath}'`, operation, 2, '', { cause: error })
    }
  }

  #find(fingerprint: string): StoredKey | undefined {
    const wanted = fingerprint.toUpperCase()
    return this.#keys.find(({ record }) => record.fingerprints.includes(wanted))
  }

  #require(fingerprint: string): StoredKey {
    const key = this.#find(fingerprint)
    if (key === undefined) {
      throw new Error(`Unknown key: ${fingerprint}`)
    }
    return key
  }
}
