/**
 * Error hierarchy for sealpost.
 *
 * @remarks
 * Configuration, key and lifecycle errors are thrown and abort the whole run.
 * Per-file errors ({@link FileOperationError}) are returned inside a
 * `Result` by the workflow operations so that a batch loop can record them
 * and move on to the next file.
 *
 * @packageDocumentation
 */

import type { InvalidKey, Role } from './types.js'

/** Base error for all sealpost errors. */
export class SealpostError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SealpostError'
  }
}

// --- Run-level failures ---

/**
 * Thrown when a required runtime setting is missing or blank, or a settings
 * file cannot be read.
 */
export class ConfigurationError extends SealpostError {
  /** The settings key (or file path) that caused the failure. */
  readonly setting: string

  constructor(message: string, setting: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigurationError'
    this.setting = setting
  }
}

/**
 * Thrown when the engine returns a key that carries no user id email, so it
 * cannot be bound to either configured identity.
 */
export class InvalidKeyError extends SealpostError {
  /** Key id of the offending key as reported by the engine. */
  readonly keyId: string

  constructor(message: string, keyId: string) {
    super(message)
    this.name = 'InvalidKeyError'
    this.keyId = keyId
  }
}

/**
 * Thrown when an operation needs the key of a role that no key in the
 * keystore matched during initialization.
 */
export class KeyNotConfiguredError extends SealpostError {
  readonly role: Role

  constructor(message: string, role: Role) {
    super(message)
    this.name = 'KeyNotConfiguredError'
    this.role = role
  }
}

/** Thrown when a file operation is invoked before `init()` completed. */
export class NotInitializedError extends SealpostError {
  constructor(message: string) {
    super(message)
    this.name = 'NotInitializedError'
  }
}

// --- Per-file failures ---

/**
 * Thrown by a passphrase resolver when the settings it needs are absent or
 * the secret backend call fails.
 */
export class SecretRetrievalError extends SealpostError {
  readonly role: Role
  /** The passphrase protection mode that was being used. */
  readonly mode: string

  constructor(message: string, role: Role, mode: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SecretRetrievalError'
    this.role = role
    this.mode = mode
  }
}

/**
 * Returned when the engine rejected one or more recipients of an encryption.
 * The source file is not archived.
 */
export class EncryptionRecipientError extends SealpostError {
  readonly invalidRecipients: readonly InvalidKey[]

  constructor(message: string, invalidRecipients: readonly InvalidKey[]) {
    super(message)
    this.name = 'EncryptionRecipientError'
    this.invalidRecipients = invalidRecipients
  }
}

/**
 * Returned when none of the signatures on a decrypted file is valid, fully
 * trusted and made by the configured sender key. The decrypted file has
 * already been deleted when this error is produced.
 */
export class SenderAuthenticationError extends SealpostError {
  /** Path of the decrypted file that was deleted. */
  readonly destinationPath: string
  readonly matchCount: number

  constructor(message: string, destinationPath: string, matchCount: number) {
    super(message)
    this.name = 'SenderAuthenticationError'
    this.destinationPath = destinationPath
    this.matchCount = matchCount
  }
}

/** Engine operations that can fail. */
export type EngineOperation = 'version' | 'list-keys' | 'encrypt-sign' | 'decrypt-verify'

/** Thrown when the OpenPGP engine fails or reports an unusable result. */
export class EngineError extends SealpostError {
  readonly operation: EngineOperation
  /** Process exit code, when the engine is an external process. */
  readonly exitCode: number | undefined
  /** Diagnostic output of the engine. */
  readonly stderr: string

  constructor(
    message: string,
    operation: EngineOperation,
    exitCode: number | undefined,
    stderr: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'EngineError'
    this.operation = operation
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/** Errors that abort a single file operation but not the run. */
export type FileOperationError =
  | SecretRetrievalError
  | EncryptionRecipientError
  | SenderAuthenticationError
  | EngineError

/**
 * Type guard for {@link FileOperationError}.
 */
export function isFileOperationError(err: unknown): err is FileOperationError {
  return (
    err instanceof SecretRetrievalError ||
    err instanceof EncryptionRecipientError ||
    err instanceof SenderAuthenticationError ||
    err instanceof EngineError
  )
}

// --- Diagnostics ---

/**
 * Describes a failed archival move. Never thrown: archival is best effort and
 * a failure is only reported.
 */
export class ArchivalWarning extends SealpostError {
  readonly sourcePath: string
  readonly archivePath: string

  constructor(message: string, sourcePath: string, archivePath: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ArchivalWarning'
    this.sourcePath = sourcePath
    this.archivePath = archivePath
  }
}
