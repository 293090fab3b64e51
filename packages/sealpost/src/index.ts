/**
 * sealpost: signed and encrypted file exchange over OpenPGP, with sender
 * authentication that fails closed.
 *
 * @packageDocumentation
 */

export {
  SealpostError,
  ConfigurationError,
  InvalidKeyError,
  KeyNotConfiguredError,
  NotInitializedError,
  SecretRetrievalError,
  EncryptionRecipientError,
  SenderAuthenticationError,
  EngineError,
  ArchivalWarning,
  isFileOperationError,
} from './errors.js'
export type { EngineOperation, FileOperationError } from './errors.js'

export { ROLES } from './types.js'
export type {
  Role,
  RuntimeSettings,
  KeyRecord,
  KeySignature,
  EngineInfo,
  InvalidKey,
  EncryptionOutcome,
  DecryptionRecipient,
  SignatureSummaryFlag,
  Validity,
  SignatureRecord,
  VerificationOutcome,
  AuthenticationDecision,
} from './types.js'

export { ok, err } from './util/result.js'
export type { Ok, Err, Result } from './util/result.js'

export { createLogger } from './logger.js'
export type { Logger } from './logger.js'

export {
  SettingKeys,
  awsSecretsNameKey,
  windowsDpapiSecretKey,
  aspNetDpapiSecretKey,
  requireSetting,
  optionalSetting,
  flattenSettings,
  loadSettingsFile,
  loadScenarioSettings,
} from './settings.js'

export {
  PASSPHRASE_MODES,
  DEFAULT_PASSPHRASE_MODE,
  parsePassphraseMode,
  createPassphraseResolver,
  resolvePassphrase,
  AwsSecretsManagerResolver,
  WindowsDpapiResolver,
  AspNetDpapiResolver,
  createAwsSecretFetcher,
  SECRET_PASSPHRASE_FIELD,
} from './passphrase/index.js'
export type {
  PassphraseMode,
  PassphraseResolver,
  PassphraseResolverDeps,
  PassphraseResolverFactory,
  PassphraseCallback,
  SecretFetcher,
  WindowsDpapiUnwrapper,
  AspNetDpapiUnwrapper,
  AwsSecretFetcherOptions,
} from './passphrase/index.js'

export { KeyDirectory } from './keys/index.js'
export type { RoleKeys } from './keys/index.js'

export { GpgEngine, extractEmail } from './engine/index.js'
export type {
  OpenPgpEngine,
  ListKeysOptions,
  EncryptAndSignRequest,
  DecryptAndVerifyRequest,
  GpgEngineOptions,
} from './engine/index.js'

export { ArchiveManager } from './archive.js'
export type { ArchiveResult } from './archive.js'

export { CryptoWorkflow, authenticate } from './workflow.js'
export type {
  CryptoWorkflowOptions,
  WorkflowContext,
  EncryptReport,
  DecryptReport,
  SecretCheck,
} from './workflow.js'

export { runBatch, destinationFileName } from './batch.js'
export type { BatchDirection, BatchFailure, BatchSummary } from './batch.js'

export { runDoctor, checkGpg, checkPowershell } from './doctor/index.js'
export type {
  RunDoctorOptions,
  PreflightCheckStatus,
  PreflightCheck,
  DoctorCheck,
  PreflightResult,
} from './doctor/index.js'

export type { Platform } from './util/platform.js'
