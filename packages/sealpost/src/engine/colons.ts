/**
 * Parser for `gpg --with-colons` key listings.
 *
 * @remarks
 * Only the records sealpost needs are read: `pub`/`sec` start a key,
 * `fpr` lines add fingerprints (primary first, then one per `sub`/`ssb`),
 * `uid` lines add user ids and `sig` lines add certifications.
 *
 * @internal
 */

import type { KeyRecord, KeySignature } from '../types.js'

/**
 * Parse a gpg timestamp field: seconds since the epoch, or ISO 8601 basic
 * format (`20240131T120000`) under `--fixed-list-mode`'s `--with-colons`
 * variants. Empty or unparseable fields yield `undefined`.
 */
export function parseGpgTimestamp(field: string | undefined): Date | undefined {
  if (field === undefined || field === '' || field === '0') {
    return undefined
  }
  if (/^\d+$/.test(field)) {
    return new Date(Number.parseInt(field, 10) * 1000)
  }
  const iso = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/.exec(field)
  if (iso === null) {
    return undefined
  }
  const [, year, month, day, hour, minute, second] = iso
  return new Date(`${String(year)}-${String(month)}-${String(day)}T${String(hour)}:${String(minute)}:${String(second)}Z`)
}

/** Undo the `\xHH` escaping gpg applies to colon-listing strings. */
export function unescapeColonField(field: string): string {
  return field.replace(/\\x([0-9a-fA-F]{2})/g, (_match, hex: string) =>
    String.fromCharCode(Number.parseInt(hex, 16)),
  )
}

/**
 * Extract the email of a user id: the text between angle brackets, or the
 * whole user id when it is a bare address.
 */
export function extractEmail(userId: string): string | undefined {
  const bracketed = /<([^<>]*)>/.exec(userId)
  if (bracketed !== null) {
    const email = bracketed[1]?.trim() ?? ''
    return email === '' ? undefined : email
  }
  const bare = userId.trim()
  return /^[^\s@]+@[^\s@]+$/.test(bare) ? bare : undefined
}

interface KeyDraft {
  record: KeyRecord
  /** Whether the next `fpr` line belongs to the primary key. */
  expectingFingerprint: boolean
}

/**
 * Parse colon-delimited listing output into key records, in listing order.
 */
export function parseColonListing(output: string): KeyRecord[] {
  const keys: KeyRecord[] = []
  let current: KeyDraft | undefined

  for (const line of output.split(/\r?\n/)) {
    const fields = line.split(':')
    const recordType = fields[0]

    switch (recordType) {
      case 'pub':
      case 'sec': {
        current = {
          record: {
            keyId: fields[4] ?? '',
            email: undefined,
            userIds: [],
            fingerprints: [],
            // Field 15 carries the secret-key marker when --with-secret is set.
            hasSecret: recordType === 'sec' || (fields[14] ?? '') !== '',
            signatures: [],
          },
          expectingFingerprint: true,
        }
        keys.push(current.record)
        break
      }
      case 'sub':
      case 'ssb': {
        if (current !== undefined) {
          current.expectingFingerprint = true
        }
        break
      }
      case 'fpr': {
        if (current?.expectingFingerprint === true) {
          current.record.fingerprints.push(fields[9] ?? '')
          current.expectingFingerprint = false
        }
        break
      }
      case 'uid': {
        if (current === undefined) break
        const userId = unescapeColonField(fields[9] ?? '')
        if (current.record.userIds.length === 0) {
          current.record.email = extractEmail(userId)
        }
        current.record.userIds.push(userId)
        break
      }
      case 'sig': {
        if (current === undefined) break
        const issuerUserId = unescapeColonField(fields[9] ?? '')
        const signature: KeySignature = {
          issuerKeyId: fields[4] ?? '',
          issuerUserId: issuerUserId === '' ? undefined : issuerUserId,
          createdAt: parseGpgTimestamp(fields[5]),
          signatureClass: fields[10] ?? '',
        }
        current.record.signatures.push(signature)
        break
      }
      default:
        break
    }
  }

  return keys
}
