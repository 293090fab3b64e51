import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { EngineError } from 'sealpost'
import { InMemoryEngine, TEST_MESSAGE_TYPE } from '../../src/index.js'

describe('InMemoryEngine', () => {
  let dir: string
  let engine: InMemoryEngine

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sealpost-engine-'))
    engine = new InMemoryEngine()
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  function file(name: string): string {
    return path.join(dir, name)
  }

  describe('addKey', () => {
    it('creates a primary key and subkeys with distinct fingerprints', () => {
      const key = engine.addKey({ email: 'alice@home.internal', subkeys: 2 })

      expect(key.email).toBe('alice@home.internal')
      expect(key.userIds).toEqual(['Test User <alice@home.internal>'])
      expect(key.fingerprints).toHaveLength(3)
      expect(new Set(key.fingerprints).size).toBe(3)
      expect(key.fingerprints[0]).toMatch(/^[0-9A-F]{40}$/)
      expect(key.keyId).toBe(key.fingerprints[0]?.slice(-16))
      expect(key.hasSecret).toBe(true)
    })

    it('takes the email from a custom user id', () => {
      const key = engine.addKey({ userId: 'Ops Team (batch) <ops@home.internal>' })
      expect(key.email).toBe('ops@home.internal')
    })

    it('supports keys without an email', () => {
      const key = engine.addKey({ userId: 'No Address' })
      expect(key.email).toBeUndefined()
    })
  })

  describe('listKeys', () => {
    it('matches user ids without regard to case', async () => {
      engine.addKey({ email: 'alice@home.internal' })
      engine.addKey({ email: 'bob@home.internal' })

      const keys = await engine.listKeys(['ALICE@home.internal'])
      expect(keys.map((key) => key.email)).toEqual(['alice@home.internal'])
    })

    it('matches fingerprints exactly', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal' })
      engine.addKey({ email: 'bob@home.internal' })

      const keys = await engine.listKeys([alice.fingerprints[0] ?? ''])
      expect(keys).toHaveLength(1)
    })

    it('filters to secret keys', async () => {
      engine.addKey({ email: 'alice@home.internal', secret: false })
      engine.addKey({ email: 'bob@home.internal' })

      const keys = await engine.listKeys([], { secretOnly: true })
      expect(keys.map((key) => key.email)).toEqual(['bob@home.internal'])
    })
  })

  describe('encryptAndSign / decryptAndVerify', () => {
    it('round-trips a signed message', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal', passphrase: 'test-secret-a' })
      const bob = engine.addKey({ email: 'bob@home.internal', passphrase: 'test-secret-b' })
      await fs.writeFile(file('plain.txt'), 'hello bob')

      const encrypted = await engine.encryptAndSign({
        recipients: [bob.fingerprints[0] ?? ''],
        signer: alice.fingerprints[0] ?? '',
        inputPath: file('plain.txt'),
        outputPath: file('plain.txt.asc'),
        alwaysTrust: true,
        passphrase: () => Promise.resolve('test-secret-a'),
      })
      expect(encrypted).toEqual({
        invalidRecipients: [],
        invalidSigners: [],
        signaturesCreated: 1,
        success: true,
      })

      const outcome = await engine.decryptAndVerify({
        inputPath: file('plain.txt.asc'),
        outputPath: file('out.txt'),
        passphrase: () => Promise.resolve('test-secret-b'),
      })

      await expect(fs.readFile(file('out.txt'), 'utf-8')).resolves.toBe('hello bob')
      expect(outcome.decrypted).toBe(true)
      expect(outcome.recipients).toEqual([{ keyId: bob.keyId, algorithm: 'ECDH' }])
      expect(outcome.signatures).toHaveLength(1)
      expect(outcome.signatures[0]?.fingerprint).toBe(alice.fingerprints[0])
      expect(outcome.signatures[0]?.summary).toEqual(['valid', 'green'])
      expect(outcome.signatures[0]?.validity).toBe('full')
    })

    it('verifies a signature made by a subkey', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal', subkeys: 2 })
      const bob = engine.addKey({ email: 'bob@home.internal' })
      const message = engine.createMessage({
        plaintext: 'x',
        recipients: [bob.fingerprints[0] ?? ''],
        signedBy: alice.fingerprints[1],
      })
      await fs.writeFile(file('m.asc'), message)

      const outcome = await engine.decryptAndVerify({
        inputPath: file('m.asc'),
        outputPath: file('m.txt'),
        passphrase: () => Promise.resolve(''),
      })
      expect(outcome.signatures[0]?.fingerprint).toBe(alice.fingerprints[1])
    })

    it('rejects unknown and revoked recipients and keys without a secret', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal', secret: false })
      const revoked = engine.addKey({ email: 'old@home.internal', revoked: true })
      await fs.writeFile(file('plain.txt'), 'x')

      const outcome = await engine.encryptAndSign({
        recipients: ['0000000000000000000000000000000000000000', revoked.fingerprints[0] ?? ''],
        signer: alice.fingerprints[0] ?? '',
        inputPath: file('plain.txt'),
        outputPath: file('plain.txt.asc'),
        alwaysTrust: true,
        passphrase: () => Promise.resolve(''),
      })

      expect(outcome.success).toBe(false)
      expect(outcome.invalidRecipients.map((invalid) => invalid.reason)).toEqual([
        'Not Found',
        'Key revoked',
      ])
      expect(outcome.invalidSigners).toEqual([
        { fingerprint: alice.fingerprints[0], reason: 'Not a secret key' },
      ])
    })

    it('throws on a wrong signing passphrase', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal', passphrase: 'test-secret' })
      await fs.writeFile(file('plain.txt'), 'x')

      await expect(
        engine.encryptAndSign({
          recipients: [alice.fingerprints[0] ?? ''],
          signer: alice.fingerprints[0] ?? '',
          inputPath: file('plain.txt'),
          outputPath: file('plain.txt.asc'),
          alwaysTrust: true,
          passphrase: () => Promise.resolve('wrong'),
        }),
      ).rejects.toThrow(EngineError)
    })

    it('reports a tampered payload as a bad signature', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal' })
      const message = engine.createMessage({
        plaintext: 'original',
        recipients: [alice.fingerprints[0] ?? ''],
        signedBy: alice.fingerprints[0],
      })
      const parsed: unknown = JSON.parse(message)
      const tampered = JSON.stringify({
        ...(typeof parsed === 'object' && parsed !== null ? parsed : {}),
        payload: Buffer.from('forged').toString('base64'),
      })
      await fs.writeFile(file('m.asc'), tampered)

      const outcome = await engine.decryptAndVerify({
        inputPath: file('m.asc'),
        outputPath: file('m.txt'),
        passphrase: () => Promise.resolve(''),
      })
      expect(outcome.signatures[0]?.summary).toEqual(['red'])
    })

    it('reports a signer missing from the keystore', async () => {
      const bob = engine.addKey({ email: 'bob@home.internal' })
      const message = engine.createMessage({
        plaintext: 'x',
        recipients: [bob.fingerprints[0] ?? ''],
        signedBy: 'FFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF',
      })
      await fs.writeFile(file('m.asc'), message)

      const outcome = await engine.decryptAndVerify({
        inputPath: file('m.asc'),
        outputPath: file('m.txt'),
        passphrase: () => Promise.resolve(''),
      })
      expect(outcome.signatures[0]?.summary).toEqual(['key-missing'])
    })

    it('uses the validity set for the signer', async () => {
      const alice = engine.addKey({ email: 'alice@home.internal' })
      engine.setValidity(alice.fingerprints[0] ?? '', 'marginal')
      const message = engine.createMessage({
        plaintext: 'x',
        recipients: [alice.fingerprints[0] ?? ''],
        signedBy: alice.fingerprints[0],
      })
      await fs.writeFile(file('m.asc'), message)

      const outcome = await engine.decryptAndVerify({
        inputPath: file('m.asc'),
        outputPath: file('m.txt'),
        passphrase: () => Promise.resolve(''),
      })
      expect(outcome.signatures[0]?.summary).toEqual([])
      expect(outcome.signatures[0]?.validity).toBe('marginal')
    })

    it('fails to decrypt data that is not a test message', async () => {
      await fs.writeFile(file('m.asc'), JSON.stringify({ type: 'other' }))

      await expect(
        engine.decryptAndVerify({
          inputPath: file('m.asc'),
          outputPath: file('m.txt'),
          passphrase: () => Promise.resolve(''),
        }),
      ).rejects.toThrow('no valid OpenPGP data found')
    })

    it('fails to decrypt without a recipient secret key', async () => {
      const bob = engine.addKey({ email: 'bob@home.internal', secret: false })
      await fs.writeFile(
        file('m.asc'),
        engine.createMessage({ plaintext: 'x', recipients: [bob.fingerprints[0] ?? ''] }),
      )

      await expect(
        engine.decryptAndVerify({
          inputPath: file('m.asc'),
          outputPath: file('m.txt'),
          passphrase: () => Promise.resolve(''),
        }),
      ).rejects.toThrow('decryption failed: No secret key')
    })

    it('writes envelopes of the test message type', () => {
      const message = engine.createMessage({ plaintext: 'x', recipients: [] })
      expect(message).toContain(`"type": "${TEST_MESSAGE_TYPE}"`)
    })
  })
})
