export type {
  DecryptAndVerifyRequest,
  EncryptAndSignRequest,
  ListKeysOptions,
  OpenPgpEngine,
} from './types.js'
export { GpgEngine } from './gpg-engine.js'
export type { GpgEngineOptions } from './gpg-engine.js'
export { parseColonListing, extractEmail, parseGpgTimestamp } from './colons.js'
export { parseDecryptionStatus, parseEncryptionStatus, parseStatusLine, summarize } from './status.js'
export type { SignatureStatus, StatusLine } from './status.js'
export { hashAlgorithmName, invalidKeyReason, pubkeyAlgorithmName } from './algorithms.js'
