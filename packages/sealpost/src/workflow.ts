/**
 * The encrypt-and-sign / decrypt-and-verify workflow.
 *
 * @remarks
 * A {@link CryptoWorkflow} is configured once from {@link RuntimeSettings},
 * bound to the keystore by {@link CryptoWorkflow.init}, and then processes
 * one file at a time. Decrypted plaintext is only left on disk when at least
 * one signature on it is valid, made by a fully valid key, and made by the
 * configured sender's primary key or first subkey.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import type { ArchiveResult } from './archive.js'
import { ArchiveManager } from './archive.js'
import type { OpenPgpEngine } from './engine/types.js'
import {
  EncryptionRecipientError,
  EngineError,
  NotInitializedError,
  SecretRetrievalError,
  SenderAuthenticationError,
  isFileOperationError,
} from './errors.js'
import type { FileOperationError } from './errors.js'
import { KeyDirectory } from './keys/directory.js'
import { createLogger } from './logger.js'
import type { Logger } from './logger.js'
import { resolvePassphrase } from './passphrase/registry.js'
import type { PassphraseCallback, PassphraseResolverDeps } from './passphrase/types.js'
import { SettingKeys, requireSetting } from './settings.js'
import { ROLES } from './types.js'
import type {
  AuthenticationDecision,
  EncryptionOutcome,
  EngineInfo,
  KeyRecord,
  Role,
  RuntimeSettings,
  VerificationOutcome,
} from './types.js'
import { err, ok } from './util/result.js'
import type { Result } from './util/result.js'

/** Collaborators and configuration of a {@link CryptoWorkflow}. */
export interface CryptoWorkflowOptions {
  settings: RuntimeSettings
  engine: OpenPgpEngine
  /** Secret backends for passphrase resolution; defaults are built from settings. */
  passphraseDeps?: PassphraseResolverDeps | undefined
  archive?: ArchiveManager | undefined
  logger?: Logger | undefined
}

/**
 * Immutable state produced by {@link CryptoWorkflow.init}.
 * @public
 */
export interface WorkflowContext {
  readonly sender: string
  readonly recipient: string
  readonly senderKey: KeyRecord | undefined
  readonly recipientKey: KeyRecord | undefined
  readonly settings: RuntimeSettings
  readonly engine: OpenPgpEngine
  readonly engineInfo: EngineInfo
  /** Resolves a role's passphrase with the configured protection mode. */
  readonly passphrases: (role: Role) => Promise<string>
}

/** Report of a successful encryption. */
export interface EncryptReport {
  sourcePath: string
  destinationPath: string
  outcome: EncryptionOutcome
  /** `undefined` when no archive path was given. */
  archive: ArchiveResult | undefined
}

/** Report of a successful, authenticated decryption. */
export interface DecryptReport {
  sourcePath: string
  destinationPath: string
  outcome: VerificationOutcome
  authentication: AuthenticationDecision
  /** `undefined` when no archive path was given. */
  archive: ArchiveResult | undefined
}

/** Outcome of resolving one role's passphrase in {@link CryptoWorkflow.testSecrets}. */
export interface SecretCheck {
  role: Role
  result: Result<undefined, SecretRetrievalError>
}

/**
 * Decide whether a decryption outcome proves the file came from the sender.
 *
 * @remarks
 * A signature counts when its summary includes `valid`, its validity is
 * exactly `full`, and its fingerprint is the sender key's primary or first
 * subkey fingerprint. One counted signature authenticates the file.
 */
export function authenticate(
  outcome: VerificationOutcome,
  senderKey: KeyRecord,
  directory: KeyDirectory,
): AuthenticationDecision {
  let matchCount = 0
  for (const signature of outcome.signatures) {
    if (
      signature.summary.includes('valid') &&
      signature.validity === 'full' &&
      directory.verifyThumbprint(senderKey, signature.fingerprint)
    ) {
      matchCount++
    }
  }
  return { authenticated: matchCount > 0, matchCount }
}

async function fileSizeKBytes(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath)
    return Math.round((stats.size / 1024) * 100) / 100
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }
    throw error
  }
}

/**
 * Secure file exchange workflow between a configured sender and recipient.
 *
 * @example
 * ```ts
 * const workflow = new CryptoWorkflow({ settings, engine: new GpgEngine() })
 * await workflow.init()
 * const result = await workflow.decryptAndVerifyFile('in/data.csv.asc', 'out/data.csv')
 * if (!result.ok) console.error(result.error.message)
 * ```
 *
 * @public
 */
export class CryptoWorkflow {
  readonly #settings: RuntimeSettings
  readonly #engine: OpenPgpEngine
  readonly #passphraseDeps: PassphraseResolverDeps
  readonly #archive: ArchiveManager
  readonly #logger: Logger
  readonly #directory: KeyDirectory
  #context: WorkflowContext | undefined

  constructor(options: CryptoWorkflowOptions) {
    this.#settings = options.settings
    this.#engine = options.engine
    this.#logger = (options.logger ?? createLogger('sealpost')).child({ component: 'workflow' })
    this.#passphraseDeps = { logger: this.#logger, ...options.passphraseDeps }
    this.#archive = options.archive ?? new ArchiveManager(this.#logger)
    this.#directory = new KeyDirectory(this.#logger)
  }

  /** The context built by {@link CryptoWorkflow.init}, if it ran. */
  get context(): WorkflowContext | undefined {
    return this.#context
  }

  /**
   * Validate the identities and bind the keystore keys to them.
   *
   * @throws ConfigurationError if an identity is not configured
   * @throws InvalidKeyError if a matching key carries no email
   * @throws {@link EngineError} if the engine cannot list keys
   */
  async init(): Promise<WorkflowContext> {
    const sender = requireSetting(this.#settings, SettingKeys.senderEmail)
    const recipient = requireSetting(this.#settings, SettingKeys.recipientEmail)

    const engineInfo = await this.#engine.getEngineInfo()
    this.#logger.info(
      { fileName: engineInfo.fileName, version: engineInfo.version, homeDir: engineInfo.homeDir },
      'OpenPGP engine',
    )

    const candidates = await this.#engine.listKeys([sender, recipient])
    const { senderKey, recipientKey } = this.#directory.initialize(sender, recipient, candidates)

    const settings = this.#settings
    const deps = this.#passphraseDeps
    this.#context = Object.freeze({
      sender,
      recipient,
      senderKey,
      recipientKey,
      settings,
      engine: this.#engine,
      engineInfo,
      passphrases: (role: Role) => resolvePassphrase(role, settings, deps),
    })
    return this.#context
  }

  /**
   * Encrypt `sourcePath` for the recipient, sign it with the sender key and
   * write the armored result to `destinationPath`.
   *
   * @remarks
   * The source is moved to `archivePath` afterwards when one is given and
   * every recipient was accepted. An archival failure only shows up as a
   * warning in the report.
   *
   * @throws {@link NotInitializedError} before {@link CryptoWorkflow.init}
   * @throws KeyNotConfiguredError if no key is bound to a role
   */
  async encryptAndSignFile(
    sourcePath: string,
    destinationPath: string,
    archivePath?: string,
  ): Promise<Result<EncryptReport, FileOperationError>> {
    const context = this.#requireContext()
    const senderKey = this.#directory.requireKey('Sender')
    const recipientKey = this.#directory.requireKey('Recipient')

    this.#logger.info(
      { sourcePath, sizeKBytes: await fileSizeKBytes(sourcePath) },
      'Encrypting and signing file',
    )

    let outcome: EncryptionOutcome
    try {
      outcome = await context.engine.encryptAndSign({
        recipients: [primaryFingerprint(recipientKey)],
        signer: primaryFingerprint(senderKey),
        inputPath: sourcePath,
        outputPath: destinationPath,
        alwaysTrust: true,
        passphrase: this.#passphraseFor(context, 'Sender'),
      })
    } catch (error) {
      return this.#fileFailure(error, sourcePath)
    }

    if (outcome.invalidRecipients.length > 0) {
      for (const invalid of outcome.invalidRecipients) {
        this.#logger.error(
          { fingerprint: invalid.fingerprint, reason: invalid.reason },
          'Recipient rejected by the engine',
        )
      }
      return err(
        new EncryptionRecipientError(
          `Encryption failed for ${String(outcome.invalidRecipients.length)} recipient(s)`,
          outcome.invalidRecipients,
        ),
      )
    }
    if (outcome.invalidSigners.length > 0) {
      const reasons = outcome.invalidSigners
        .map((invalid) => `${invalid.fingerprint} (${invalid.reason})`)
        .join(', ')
      const error = new EngineError(`Signing key rejected: ${reasons}`, 'encrypt-sign', undefined, '')
      this.#logger.error({ sourcePath, err: error }, error.message)
      return err(error)
    }

    this.#logger.info(
      {
        destinationPath,
        sizeKBytes: await fileSizeKBytes(destinationPath),
        signaturesCreated: outcome.signaturesCreated,
      },
      'File encrypted and signed',
    )

    const archive =
      archivePath !== undefined ? await this.#archive.move(sourcePath, archivePath) : undefined
    return ok({ sourcePath, destinationPath, outcome, archive })
  }

  /**
   * Decrypt `sourcePath` into `destinationPath` and authenticate the sender.
   *
   * @remarks
   * When no signature authenticates the sender the decrypted file is deleted
   * and a {@link SenderAuthenticationError} is returned. The source is moved
   * to `archivePath` (when given) whatever the verification outcome, but not
   * when the engine failed to decrypt.
   *
   * @throws {@link NotInitializedError} before {@link CryptoWorkflow.init}
   * @throws KeyNotConfiguredError if no key is bound to the sender
   */
  async decryptAndVerifyFile(
    sourcePath: string,
    destinationPath: string,
    archivePath?: string,
  ): Promise<Result<DecryptReport, FileOperationError>> {
    const context = this.#requireContext()
    const senderKey = this.#directory.requireKey('Sender')

    this.#logger.info(
      { sourcePath, sizeKBytes: await fileSizeKBytes(sourcePath) },
      'Decrypting and verifying file',
    )

    let outcome: VerificationOutcome
    try {
      outcome = await context.engine.decryptAndVerify({
        inputPath: sourcePath,
        outputPath: destinationPath,
        passphrase: this.#passphraseFor(context, 'Recipient'),
      })
    } catch (error) {
      await fs.rm(destinationPath, { force: true })
      return this.#fileFailure(error, sourcePath)
    }

    for (const recipient of outcome.recipients) {
      this.#logger.info(
        { keyId: recipient.keyId, algorithm: recipient.algorithm },
        'Decryption recipient',
      )
    }
    for (const signature of outcome.signatures) {
      this.#logger.info(
        {
          fingerprint: signature.fingerprint,
          hashAlgorithm: signature.hashAlgorithm,
          keyAlgorithm: signature.keyAlgorithm,
          timestamp: signature.timestamp?.toISOString(),
          summary: signature.summary,
          validity: signature.validity,
        },
        'Signature',
      )
      if (!signature.summary.includes('valid') || signature.validity !== 'full') {
        this.#logger.warn(
          { fingerprint: signature.fingerprint, summary: signature.summary, validity: signature.validity },
          'Signature is not valid and fully trusted',
        )
      }
    }

    const authentication = authenticate(outcome, senderKey, this.#directory)

    const archive =
      archivePath !== undefined ? await this.#archive.move(sourcePath, archivePath) : undefined

    if (!authentication.authenticated) {
      await fs.rm(destinationPath, { force: true })
      const error = new SenderAuthenticationError(
        `Sender authentication failed: no valid signature by ${context.sender} on [${sourcePath}]; decrypted file deleted`,
        destinationPath,
        authentication.matchCount,
      )
      this.#logger.error({ sourcePath, destinationPath }, error.message)
      return err(error)
    }

    this.#logger.info(
      {
        destinationPath,
        sizeKBytes: await fileSizeKBytes(destinationPath),
        matchCount: authentication.matchCount,
      },
      'File decrypted and sender authenticated',
    )
    return ok({ sourcePath, destinationPath, outcome, authentication, archive })
  }

  /**
   * Resolve the passphrase of each role with the configured protection mode,
   * without revealing them. Does not need {@link CryptoWorkflow.init}.
   */
  async testSecrets(): Promise<SecretCheck[]> {
    const checks: SecretCheck[] = []
    for (const role of ROLES) {
      try {
        await resolvePassphrase(role, this.#settings, this.#passphraseDeps)
        this.#logger.info({ role }, `${role}'s passphrase resolved`)
        checks.push({ role, result: ok(undefined) })
      } catch (error) {
        if (!(error instanceof SecretRetrievalError)) {
          throw error
        }
        this.#logger.error({ role, err: error }, error.message)
        checks.push({ role, result: err(error) })
      }
    }
    return checks
  }

  #requireContext(): WorkflowContext {
    if (this.#context === undefined) {
      throw new NotInitializedError('CryptoWorkflow.init() must complete before processing files')
    }
    return this.#context
  }

  #passphraseFor(context: WorkflowContext, role: Role): PassphraseCallback {
    return () => context.passphrases(role)
  }

  #fileFailure(error: unknown, sourcePath: string): Result<never, FileOperationError> {
    if (!isFileOperationError(error)) {
      throw error
    }
    this.#logger.error({ sourcePath, err: error }, error.message)
    return err(error)
  }
}

function primaryFingerprint(key: KeyRecord): string {
  return key.fingerprints[0] ?? key.keyId
}
