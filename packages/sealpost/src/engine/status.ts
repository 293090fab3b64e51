/**
 * Interpretation of gpg `--status-fd` output.
 *
 * @remarks
 * Status lines have the form `[GNUPG:] KEYWORD arg1 arg2 ...`. The parsers
 * here fold a complete transcript into the outcome types the workflow uses.
 *
 * @internal
 */

import type {
  DecryptionRecipient,
  EncryptionOutcome,
  InvalidKey,
  SignatureRecord,
  SignatureSummaryFlag,
  Validity,
  VerificationOutcome,
} from '../types.js'
import { hashAlgorithmName, invalidKeyReason, pubkeyAlgorithmName } from './algorithms.js'
import { parseGpgTimestamp } from './colons.js'

const STATUS_PREFIX = '[GNUPG:] '

/** A single parsed status line. */
export interface StatusLine {
  keyword: string
  args: string[]
}

/** Parse one line of status output; `undefined` for anything else. */
export function parseStatusLine(line: string): StatusLine | undefined {
  if (!line.startsWith(STATUS_PREFIX)) {
    return undefined
  }
  const [keyword, ...args] = line.slice(STATUS_PREFIX.length).trim().split(' ')
  if (keyword === undefined || keyword === '') {
    return undefined
  }
  return { keyword, args }
}

function parseTranscript(output: string): StatusLine[] {
  const lines: StatusLine[] = []
  for (const line of output.split(/\r?\n/)) {
    const status = parseStatusLine(line)
    if (status !== undefined) lines.push(status)
  }
  return lines
}

function invalidKey(args: string[]): InvalidKey {
  return { fingerprint: args[1] ?? '', reason: invalidKeyReason(args[0] ?? '') }
}

/**
 * Fold the status output of `--sign --encrypt` into an outcome.
 *
 * @param exitCode - exit code of the gpg process
 */
export function parseEncryptionStatus(output: string, exitCode: number): EncryptionOutcome {
  const invalidRecipients: InvalidKey[] = []
  const invalidSigners: InvalidKey[] = []
  let signaturesCreated = 0
  let ended = false

  for (const { keyword, args } of parseTranscript(output)) {
    switch (keyword) {
      case 'INV_RECP':
        invalidRecipients.push(invalidKey(args))
        break
      case 'INV_SGNR':
        invalidSigners.push(invalidKey(args))
        break
      case 'SIG_CREATED':
        signaturesCreated++
        break
      case 'END_ENCRYPTION':
        ended = true
        break
      default:
        break
    }
  }

  return {
    invalidRecipients,
    invalidSigners,
    signaturesCreated,
    success:
      exitCode === 0 && ended && invalidRecipients.length === 0 && invalidSigners.length === 0,
  }
}

export type SignatureStatus = 'good' | 'bad' | 'expired-sig' | 'expired-key' | 'revoked-key' | 'error'

const SIGNATURE_KEYWORDS: Readonly<Record<string, SignatureStatus>> = {
  GOODSIG: 'good',
  BADSIG: 'bad',
  EXPSIG: 'expired-sig',
  EXPKEYSIG: 'expired-key',
  REVKEYSIG: 'revoked-key',
  ERRSIG: 'error',
}

const TRUST_KEYWORDS: Readonly<Record<string, Validity>> = {
  TRUST_UNDEFINED: 'undefined',
  TRUST_NEVER: 'never',
  TRUST_MARGINAL: 'marginal',
  TRUST_FULLY: 'full',
  TRUST_ULTIMATE: 'ultimate',
}

// ERRSIG return code for a signature made by a key not in the keystore.
const ERRSIG_NO_PUBKEY = '9'

interface SignatureDraft {
  status: SignatureStatus | undefined
  keyId: string
  fingerprint: string | undefined
  keyAlgorithm: string
  hashAlgorithm: string
  timestamp: Date | undefined
  validity: Validity
  missingKey: boolean
}

function emptyDraft(): SignatureDraft {
  return {
    status: undefined,
    keyId: '',
    fingerprint: undefined,
    keyAlgorithm: 'unknown',
    hashAlgorithm: 'unknown',
    timestamp: undefined,
    validity: 'unknown',
    missingKey: false,
  }
}

/** Summary flags for a finished signature. */
export function summarize(
  status: SignatureStatus | undefined,
  validity: Validity,
  missingKey: boolean,
): SignatureSummaryFlag[] {
  const summary: SignatureSummaryFlag[] = []
  if (status === 'good' && (validity === 'full' || validity === 'ultimate')) {
    summary.push('valid', 'green')
  }
  if (status === 'bad' || validity === 'never') {
    summary.push('red')
  }
  if (status === 'revoked-key') summary.push('key-revoked')
  if (status === 'expired-key') summary.push('key-expired')
  if (status === 'expired-sig') summary.push('sig-expired')
  if (missingKey) summary.push('key-missing')
  return summary
}

function finish(draft: SignatureDraft): SignatureRecord {
  return {
    fingerprint: draft.fingerprint ?? draft.keyId,
    hashAlgorithm: draft.hashAlgorithm,
    keyAlgorithm: draft.keyAlgorithm,
    timestamp: draft.timestamp,
    summary: summarize(draft.status, draft.validity, draft.missingKey),
    validity: draft.validity,
  }
}

/**
 * Fold the status output of `--decrypt` into an outcome.
 *
 * @remarks
 * A signature starts at `NEWSIG` (or at its result line when the engine
 * omits `NEWSIG`). `VALIDSIG` supplies the fingerprint of the signing key
 * or subkey and the algorithms; `TRUST_*` supplies the validity.
 */
export function parseDecryptionStatus(output: string): VerificationOutcome {
  const recipients: DecryptionRecipient[] = []
  const signatures: SignatureRecord[] = []
  let draft: SignatureDraft | undefined
  let decryptionOkay = false
  let decryptionFailed = false

  const flush = (): void => {
    if (draft?.status !== undefined) {
      signatures.push(finish(draft))
    }
    draft = undefined
  }

  for (const { keyword, args } of parseTranscript(output)) {
    const signatureStatus = SIGNATURE_KEYWORDS[keyword]
    const trust = TRUST_KEYWORDS[keyword]

    if (keyword === 'NEWSIG') {
      flush()
      draft = emptyDraft()
    } else if (signatureStatus !== undefined) {
      if (draft?.status !== undefined) flush()
      draft ??= emptyDraft()
      draft.status = signatureStatus
      draft.keyId = args[0] ?? ''
      if (signatureStatus === 'error') {
        draft.keyAlgorithm = pubkeyAlgorithmName(args[1] ?? '')
        draft.hashAlgorithm = hashAlgorithmName(args[2] ?? '')
        draft.timestamp = parseGpgTimestamp(args[4])
        draft.missingKey = args[5] === ERRSIG_NO_PUBKEY
        const fingerprint = args[6]
        if (fingerprint !== undefined && fingerprint !== '-' && fingerprint !== '') {
          draft.fingerprint = fingerprint
        }
      }
    } else if (keyword === 'VALIDSIG' && draft !== undefined) {
      draft.fingerprint = args[0]
      draft.timestamp = parseGpgTimestamp(args[2])
      draft.keyAlgorithm = pubkeyAlgorithmName(args[6] ?? '')
      draft.hashAlgorithm = hashAlgorithmName(args[7] ?? '')
    } else if (trust !== undefined && draft !== undefined) {
      draft.validity = trust
    } else if (keyword === 'ENC_TO') {
      recipients.push({ keyId: args[0] ?? '', algorithm: pubkeyAlgorithmName(args[1] ?? '') })
    } else if (keyword === 'DECRYPTION_OKAY') {
      decryptionOkay = true
    } else if (keyword === 'DECRYPTION_FAILED') {
      decryptionFailed = true
    }
  }
  flush()

  return { decrypted: decryptionOkay && !decryptionFailed, recipients, signatures }
}
