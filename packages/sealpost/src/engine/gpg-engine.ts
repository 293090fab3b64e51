/**
 * {@link OpenPgpEngine} over the GnuPG `gpg` command line.
 *
 * @remarks
 * Every operation runs gpg in batch mode. Passphrases are never put on the
 * command line: gpg runs with `--pinentry-mode loopback --command-fd 0
 * --status-fd 1` and asks for the passphrase with a
 * `[GNUPG:] GET_HIDDEN passphrase.enter` status line, which is answered on
 * stdin from the operation's passphrase callback.
 */

import { EngineError } from '../errors.js'
import type { EngineOperation } from '../errors.js'
import { errorMessage } from '../logger.js'
import type { PassphraseCallback } from '../passphrase/types.js'
import type { EncryptionOutcome, EngineInfo, KeyRecord, VerificationOutcome } from '../types.js'
import { execCommandFull, execCommandInteractive } from '../util/exec.js'
import type { ExecCommandResult, LineHandler } from '../util/exec.js'
import { parseColonListing } from './colons.js'
import { parseDecryptionStatus, parseEncryptionStatus, parseStatusLine } from './status.js'
import type {
  DecryptAndVerifyRequest,
  EncryptAndSignRequest,
  ListKeysOptions,
  OpenPgpEngine,
} from './types.js'

/** Options for {@link GpgEngine}. */
export interface GpgEngineOptions {
  /** Path or name of the gpg binary. Defaults to `gpg`. */
  binary?: string | undefined
  /** Keystore directory passed as `--homedir`. */
  homeDir?: string | undefined
  /** Produce ASCII armored output. Defaults to `true`. */
  armor?: boolean | undefined
}

const PASSPHRASE_PROMPT = 'passphrase.enter'

/**
 * Build a status handler that answers passphrase prompts.
 *
 * @remarks
 * The callback runs at most once; later prompts (gpg asks again after a bad
 * passphrase) get the same answer. Any other `GET_*` prompt gets an empty
 * line, which gpg takes as the default answer.
 */
function passphraseResponder(callback: PassphraseCallback): {
  onLine: LineHandler
  failure: () => unknown
} {
  let cached: Promise<string> | undefined
  let failure: unknown

  const onLine: LineHandler = async (line) => {
    const status = parseStatusLine(line)
    if (status === undefined || !status.keyword.startsWith('GET_')) {
      return undefined
    }
    if (status.keyword === 'GET_HIDDEN' && status.args[0] === PASSPHRASE_PROMPT) {
      cached ??= callback()
      try {
        return await cached
      } catch (error) {
        failure = error
        throw error
      }
    }
    return ''
  }

  return { onLine, failure: () => failure }
}

/**
 * OpenPGP engine backed by the `gpg` binary.
 * @public
 */
export class GpgEngine implements OpenPgpEngine {
  readonly #binary: string
  readonly #homeDir: string | undefined
  readonly #armor: boolean

  constructor(options: GpgEngineOptions = {}) {
    this.#binary = options.binary ?? 'gpg'
    this.#homeDir = options.homeDir
    this.#armor = options.armor ?? true
  }

  async getEngineInfo(): Promise<EngineInfo> {
    const result = await this.#run('version', ['--version'])
    if (result.exitCode !== 0) {
      throw this.#failure('version', result)
    }
    const lines = result.stdout.split(/\r?\n/)
    const version = /\(GnuPG\)\s+(\S+)/.exec(lines[0] ?? '')?.[1] ?? lines[0]?.trim() ?? 'unknown'
    const home = lines.find((line) => line.startsWith('Home:'))?.slice('Home:'.length).trim()
    return {
      fileName: this.#binary,
      version,
      homeDir: this.#homeDir ?? (home === '' ? undefined : home),
    }
  }

  async listKeys(patterns: string[], options?: ListKeysOptions): Promise<KeyRecord[]> {
    const listing =
      options?.secretOnly === true ? ['--list-secret-keys'] : ['--with-secret', '--list-sigs']
    const result = await this.#run('list-keys', [
      '--with-colons',
      '--fixed-list-mode',
      '--with-fingerprint',
      '--with-fingerprint',
      ...listing,
      '--',
      ...patterns,
    ])
    const keys = parseColonListing(result.stdout)

    // gpg exits with 2 when a pattern matched nothing, even if others did.
    if (result.exitCode !== 0 && keys.length === 0 && !/No (public|secret) key/.test(result.stderr)) {
      throw this.#failure('list-keys', result)
    }
    return keys
  }

  async encryptAndSign(request: EncryptAndSignRequest): Promise<EncryptionOutcome> {
    const args = [
      ...this.#conversationArgs(),
      ...(request.alwaysTrust ? ['--trust-model', 'always'] : []),
      '--local-user',
      request.signer,
      ...request.recipients.flatMap((recipient) => ['--recipient', recipient]),
      '--output',
      request.outputPath,
      '--sign',
      '--encrypt',
      '--',
      request.inputPath,
    ]
    const result = await this.#converse('encrypt-sign', args, request.passphrase)
    const outcome = parseEncryptionStatus(result.stdout, result.exitCode)

    if (outcome.invalidRecipients.length > 0 || outcome.invalidSigners.length > 0) {
      return outcome
    }
    if (!outcome.success) {
      throw this.#failure('encrypt-sign', result)
    }
    return outcome
  }

  async decryptAndVerify(request: DecryptAndVerifyRequest): Promise<VerificationOutcome> {
    const args = [
      ...this.#conversationArgs(),
      '--output',
      request.outputPath,
      '--decrypt',
      '--',
      request.inputPath,
    ]
    const result = await this.#converse('decrypt-verify', args, request.passphrase)
    const outcome = parseDecryptionStatus(result.stdout)

    // A non-zero exit with a decrypted payload only means a signature did
    // not verify; that is for the caller to judge.
    if (!outcome.decrypted) {
      throw this.#failure('decrypt-verify', result)
    }
    return outcome
  }

  #baseArgs(): string[] {
    return [
      '--batch',
      '--no-tty',
      ...(this.#homeDir !== undefined ? ['--homedir', this.#homeDir] : []),
    ]
  }

  #conversationArgs(): string[] {
    return [
      ...this.#baseArgs(),
      '--yes',
      '--pinentry-mode',
      'loopback',
      '--command-fd',
      '0',
      '--status-fd',
      '1',
      ...(this.#armor ? ['--armor'] : []),
    ]
  }

  async #run(operation: EngineOperation, args: string[]): Promise<ExecCommandResult> {
    try {
      return await execCommandFull(this.#binary, [...this.#baseArgs(), ...args])
    } catch (error) {
      throw new EngineError(
        `Failed to run ${this.#binary}: ${errorMessage(error)}`,
        operation,
        undefined,
        '',
        { cause: error },
      )
    }
  }

  async #converse(
    operation: EngineOperation,
    args: string[],
    passphrase: PassphraseCallback,
  ): Promise<ExecCommandResult> {
    const responder = passphraseResponder(passphrase)
    try {
      return await execCommandInteractive(this.#binary, args, responder.onLine)
    } catch (error) {
      // Passphrase retrieval errors surface unchanged.
      if (error === responder.failure()) {
        throw error
      }
      throw new EngineError(
        `Failed to run ${this.#binary}: ${errorMessage(error)}`,
        operation,
        undefined,
        '',
        { cause: error },
      )
    }
  }

  #failure(operation: EngineOperation, result: ExecCommandResult): EngineError {
    const detail = result.stderr.trim()
    return new EngineError(
      `${this.#binary} ${operation} failed with exit code ${String(result.exitCode)}${detail === '' ? '' : `: ${detail}`}`,
      operation,
      result.exitCode,
      result.stderr,
    )
  }
}
