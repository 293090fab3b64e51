import { describe, it, expect } from 'vitest'
import {
  extractEmail,
  parseColonListing,
  parseGpgTimestamp,
  unescapeColonField,
} from '../../../src/engine/colons.js'

const LISTING = [
  'tru::1:1714557600:0:3:1:5',
  'pub:u:255:22:1111222233334444:1714557600:::u:::scESC:::+::ed25519:::0:',
  'fpr:::::::::AAAABBBBCCCCDDDDEEEEFFFF1111222233334444:',
  'uid:u::::1714557600::HASH1::Alice Example <alice@home.internal>::::::::::0:',
  'sig:::22:1111222233334444:1714557600::::Alice Example <alice@home.internal>:13x::AAAABBBBCCCCDDDDEEEEFFFF1111222233334444:::8:',
  'sig:::22:9999888877776666:1714644000::::Carol CA <carol@home.internal>:10x:::::8:',
  'sub:u:255:18:5555666677778888:1714557600::::::e:::+::cv25519::',
  'fpr:::::::::99990000AAAABBBBCCCCDDDD5555666677778888:',
  'sig:::22:1111222233334444:1714557600::::Alice Example <alice@home.internal>:18x:::::8:',
  'pub:f:3072:1:0000111122223333:1714557600:::f:::scESC:::::::23::0:',
  'fpr:::::::::FFFF000011112222333344445555666600001111:',
  'uid:f::::1714557600::HASH2::Bob\\x3a Ops <bob@home.internal>::::::::::0:',
  'uid:f::::1714557600::HASH3::bob@backup.home.internal::::::::::0:',
].join('\n')

describe('parseColonListing', () => {
  const keys = parseColonListing(LISTING)

  it('returns one record per primary key', () => {
    expect(keys).toHaveLength(2)
    expect(keys.map((key) => key.keyId)).toEqual(['1111222233334444', '0000111122223333'])
  })

  it('collects the primary fingerprint then subkey fingerprints', () => {
    expect(keys[0]?.fingerprints).toEqual([
      'AAAABBBBCCCCDDDDEEEEFFFF1111222233334444',
      '99990000AAAABBBBCCCCDDDD5555666677778888',
    ])
  })

  it('takes the email of the first user id', () => {
    expect(keys[0]?.email).toBe('alice@home.internal')
    expect(keys[1]?.email).toBe('bob@home.internal')
    expect(keys[1]?.userIds).toEqual(['Bob: Ops <bob@home.internal>', 'bob@backup.home.internal'])
  })

  it('reads the secret marker of public listings', () => {
    expect(keys[0]?.hasSecret).toBe(true)
    expect(keys[1]?.hasSecret).toBe(false)
  })

  it('collects certifications', () => {
    expect(keys[0]?.signatures).toEqual([
      {
        issuerKeyId: '1111222233334444',
        issuerUserId: 'Alice Example <alice@home.internal>',
        createdAt: new Date(1714557600 * 1000),
        signatureClass: '13x',
      },
      {
        issuerKeyId: '9999888877776666',
        issuerUserId: 'Carol CA <carol@home.internal>',
        createdAt: new Date(1714644000 * 1000),
        signatureClass: '10x',
      },
      {
        issuerKeyId: '1111222233334444',
        issuerUserId: 'Alice Example <alice@home.internal>',
        createdAt: new Date(1714557600 * 1000),
        signatureClass: '18x',
      },
    ])
  })

  it('marks keys from a secret listing', () => {
    const [key] = parseColonListing('sec:u:255:22:1111222233334444:1714557600::::::::::::\n')
    expect(key?.hasSecret).toBe(true)
    expect(key?.email).toBeUndefined()
  })

  it('ignores everything before the first key', () => {
    expect(parseColonListing('tru::1:1714557600:0:3:1:5\n')).toEqual([])
  })
})

describe('extractEmail', () => {
  it('takes the address between angle brackets', () => {
    expect(extractEmail('Alice (work) <alice@home.internal>')).toBe('alice@home.internal')
  })

  it('accepts a bare address', () => {
    expect(extractEmail('alice@home.internal')).toBe('alice@home.internal')
  })

  it('returns undefined when there is no address', () => {
    expect(extractEmail('Alice Example')).toBeUndefined()
    expect(extractEmail('Alice <>')).toBeUndefined()
    expect(extractEmail('Ops alice@home.internal')).toBeUndefined()
  })
})

describe('parseGpgTimestamp', () => {
  it('parses epoch seconds', () => {
    expect(parseGpgTimestamp('1714557600')).toEqual(new Date('2024-05-01T10:00:00Z'))
  })

  it('parses ISO 8601 basic format', () => {
    expect(parseGpgTimestamp('20240501T100000')).toEqual(new Date('2024-05-01T10:00:00Z'))
  })

  it('returns undefined for empty, zero and unknown values', () => {
    expect(parseGpgTimestamp(undefined)).toBeUndefined()
    expect(parseGpgTimestamp('')).toBeUndefined()
    expect(parseGpgTimestamp('0')).toBeUndefined()
    expect(parseGpgTimestamp('yesterday')).toBeUndefined()
  })
})

describe('unescapeColonField', () => {
  it('decodes \\xHH escapes', () => {
    expect(unescapeColonField('a\\x3ab')).toBe('a:b')
  })
})
