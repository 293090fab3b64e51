import { describe, it, expect, vi } from 'vitest'
import {
  DEFAULT_PASSPHRASE_MODE,
  createPassphraseResolver,
  parsePassphraseMode,
  resolvePassphrase,
} from '../../../src/passphrase/registry.js'
import { AwsSecretsManagerResolver } from '../../../src/passphrase/aws-secrets-manager-resolver.js'
import { WindowsDpapiResolver } from '../../../src/passphrase/windows-dpapi-resolver.js'
import { AspNetDpapiResolver } from '../../../src/passphrase/aspnet-dpapi-resolver.js'
import type { SecretFetcher } from '../../../src/passphrase/types.js'
import { SecretRetrievalError } from '../../../src/errors.js'

describe('parsePassphraseMode', () => {
  it('accepts known modes ignoring case and whitespace', () => {
    expect(parsePassphraseMode('AWS_SECRETSMANAGER')).toBe('AWS_SECRETSMANAGER')
    expect(parsePassphraseMode(' windows_dpapi ')).toBe('WINDOWS_DPAPI')
  })

  it('falls back to the default for absent, blank and unknown values', () => {
    expect(DEFAULT_PASSPHRASE_MODE).toBe('ASPNET_DPAPI')
    expect(parsePassphraseMode(undefined)).toBe('ASPNET_DPAPI')
    expect(parsePassphraseMode('')).toBe('ASPNET_DPAPI')
    expect(parsePassphraseMode('KMS')).toBe('ASPNET_DPAPI')
  })
})

describe('createPassphraseResolver', () => {
  it('creates one resolver class per mode', () => {
    expect(createPassphraseResolver('AWS_SECRETSMANAGER')).toBeInstanceOf(AwsSecretsManagerResolver)
    expect(createPassphraseResolver('WINDOWS_DPAPI')).toBeInstanceOf(WindowsDpapiResolver)
    expect(createPassphraseResolver('ASPNET_DPAPI')).toBeInstanceOf(AspNetDpapiResolver)
  })
})

describe('resolvePassphrase', () => {
  function fetcher(value: string) {
    return { getSecretString: vi.fn<SecretFetcher['getSecretString']>(() => Promise.resolve(value)) }
  }

  it('dispatches on PassphraseProtectionMode', async () => {
    const secretFetcher = fetcher(JSON.stringify({ SecretPassPhrase: 'test-secret' }))

    const passphrase = await resolvePassphrase(
      'Sender',
      { PassphraseProtectionMode: 'AWS_SECRETSMANAGER', SenderAWSSecretsName: 'exchange/sender' },
      { secretFetcher },
    )

    expect(passphrase).toBe('test-secret')
    expect(secretFetcher.getSecretString).toHaveBeenCalledTimes(1)
    expect(secretFetcher.getSecretString).toHaveBeenCalledWith('exchange/sender')
  })

  it('uses the ASP.NET data protection resolver when the mode is absent', async () => {
    const unprotect = vi.fn(() => Promise.resolve('test-secret'))

    await resolvePassphrase(
      'Recipient',
      {
        RecipientEncryptedSecretPassPhrase_ASP_DPAPI: 'CfDJ8-recipient',
        entropy: 'test-purpose',
        SSLCertDistinguishedSubjectName: 'CN=exchange.home.internal',
      },
      { aspNetDpapi: { unprotect } },
    )

    expect(unprotect).toHaveBeenCalledTimes(1)
  })

  it('rejects an empty passphrase', async () => {
    await expect(
      resolvePassphrase(
        'Sender',
        { PassphraseProtectionMode: 'AWS_SECRETSMANAGER', SenderAWSSecretsName: 'exchange/sender' },
        { secretFetcher: fetcher(JSON.stringify({ SecretPassPhrase: '' })) },
      ),
    ).rejects.toThrow(new SecretRetrievalError('AWS Secrets Manager returned an empty passphrase', 'Sender', 'AWS_SECRETSMANAGER'))
  })
})
