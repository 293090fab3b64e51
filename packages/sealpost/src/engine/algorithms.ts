/**
 * OpenPGP algorithm and reason code names (RFC 4880 / RFC 6637 / GnuPG).
 */

const PUBKEY_ALGORITHMS: Readonly<Record<number, string>> = {
  1: 'RSA',
  2: 'RSA-E',
  3: 'RSA-S',
  16: 'ELG-E',
  17: 'DSA',
  18: 'ECDH',
  19: 'ECDSA',
  20: 'ELG',
  22: 'EdDSA',
}

const HASH_ALGORITHMS: Readonly<Record<number, string>> = {
  1: 'MD5',
  2: 'SHA1',
  3: 'RIPEMD160',
  8: 'SHA256',
  9: 'SHA384',
  10: 'SHA512',
  11: 'SHA224',
}

// Reason codes of the INV_RECP and INV_SGNR status lines.
const INVALID_KEY_REASONS: Readonly<Record<number, string>> = {
  0: 'No specific reason given',
  1: 'Not Found',
  2: 'Ambiguous specification',
  3: 'Wrong key usage',
  4: 'Key revoked',
  5: 'Key expired',
  6: 'No CRL known',
  7: 'CRL too old',
  8: 'Policy mismatch',
  9: 'Not a secret key',
  10: 'Key not trusted',
  11: 'Missing certificate',
  12: 'Missing issuer certificate',
  13: 'Key disabled',
  14: 'Syntax error in specification',
}

function lookup(table: Readonly<Record<number, string>>, code: string): string {
  const id = Number.parseInt(code, 10)
  if (Number.isNaN(id)) return 'unknown'
  return table[id] ?? `unknown (${String(id)})`
}

export function pubkeyAlgorithmName(code: string): string {
  return lookup(PUBKEY_ALGORITHMS, code)
}

export function hashAlgorithmName(code: string): string {
  return lookup(HASH_ALGORITHMS, code)
}

export function invalidKeyReason(code: string): string {
  return lookup(INVALID_KEY_REASONS, code)
}
