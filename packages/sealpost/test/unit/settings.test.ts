import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  awsSecretsNameKey,
  aspNetDpapiSecretKey,
  flattenSettings,
  loadScenarioSettings,
  loadSettingsFile,
  optionalSetting,
  requireRawSetting,
  requireSetting,
  windowsDpapiSecretKey,
} from '../../src/settings.js'
import { ConfigurationError } from '../../src/errors.js'

describe('role setting keys', () => {
  it('builds the per-role key names', () => {
    expect(awsSecretsNameKey('Sender')).toBe('SenderAWSSecretsName')
    expect(windowsDpapiSecretKey('Recipient')).toBe('RecipientEncryptedSecretPassPhrase_WIND_DPAPI')
    expect(aspNetDpapiSecretKey('Sender')).toBe('SenderEncryptedSecretPassPhrase_ASP_DPAPI')
  })
})

describe('requireSetting', () => {
  it('returns the trimmed value', () => {
    expect(requireSetting({ SenderEmailAddress: '  alice@home.internal ' }, 'SenderEmailAddress')).toBe(
      'alice@home.internal',
    )
  })

  it('throws ConfigurationError naming the key when absent', () => {
    expect(() => requireSetting({}, 'SenderEmailAddress')).toThrow(ConfigurationError)
    expect(() => requireSetting({}, 'SenderEmailAddress')).toThrow('SenderEmailAddress not configured')
  })

  it('throws when the value is blank', () => {
    try {
      requireSetting({ RecipientEmailAddress: '   ' }, 'RecipientEmailAddress')
      expect.fail('should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.setting).toBe('RecipientEmailAddress')
      }
    }
  })
})

describe('requireRawSetting', () => {
  it('keeps surrounding whitespace', () => {
    expect(requireRawSetting({ entropy: ' salt ' }, 'entropy')).toBe(' salt ')
  })

  it('throws ConfigurationError when absent or blank', () => {
    expect(() => requireRawSetting({}, 'entropy')).toThrow('entropy not configured')
    expect(() => requireRawSetting({ entropy: ' ' }, 'entropy')).toThrow(ConfigurationError)
  })
})

describe('optionalSetting', () => {
  it('returns undefined for absent and blank values', () => {
    expect(optionalSetting({}, 'AWSRegion')).toBeUndefined()
    expect(optionalSetting({ AWSRegion: '' }, 'AWSRegion')).toBeUndefined()
  })

  it('ignores inherited properties', () => {
    expect(optionalSetting({}, 'toString')).toBeUndefined()
  })

  it('returns the trimmed value', () => {
    expect(optionalSetting({ AWSRegion: ' eu-west-1 ' }, 'AWSRegion')).toBe('eu-west-1')
  })
})

describe('flattenSettings', () => {
  it('stores nested leaves under their own key', () => {
    expect(
      flattenSettings({
        Identities: { SenderEmailAddress: 'alice@home.internal' },
        Folders: { Source: { SourceFolderPath: '/in' } },
      }),
    ).toEqual({ SenderEmailAddress: 'alice@home.internal', SourceFolderPath: '/in' })
  })

  it('stringifies numbers and booleans and skips nulls', () => {
    expect(flattenSettings({ Retries: 3, Enabled: true, Nothing: null })).toEqual({
      Retries: '3',
      Enabled: 'true',
    })
  })

  it('keys array items by index', () => {
    expect(flattenSettings({ Extra: ['a', 'b'] })).toEqual({ '0': 'a', '1': 'b' })
  })

  it('lets later leaves overwrite earlier ones', () => {
    expect(flattenSettings({ A: { entropy: 'first' }, B: { entropy: 'second' } })).toEqual({
      entropy: 'second',
    })
  })

  it('rejects a non-object root', () => {
    expect(() => flattenSettings(['x'])).toThrow('Settings must be a JSON object')
  })
})

describe('settings files', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sealpost-settings-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('loads and flattens a settings file into a frozen object', async () => {
    const file = path.join(dir, 'settings.json')
    await fs.writeFile(file, JSON.stringify({ Mail: { SenderEmailAddress: 'alice@home.internal' } }))

    const settings = await loadSettingsFile(file)
    expect(settings).toEqual({ SenderEmailAddress: 'alice@home.internal' })
    expect(Object.isFrozen(settings)).toBe(true)
  })

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.json')
    await expect(loadSettingsFile(file)).rejects.toThrow(`Configuration file [${file}] NOT FOUND!`)
  })

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'broken.json')
    await fs.writeFile(file, '{ not json')
    await expect(loadSettingsFile(file)).rejects.toThrow(`Failed to parse configuration file at ${file}`)
  })

  it('loads a scenario relative to the app-settings file', async () => {
    await fs.mkdir(path.join(dir, 'scenarios'))
    await fs.writeFile(
      path.join(dir, 'scenarios', 'outbound.json'),
      JSON.stringify({ RecipientEmailAddress: 'bob@home.internal' }),
    )
    const appSettings = path.join(dir, 'appsettings.json')
    await fs.writeFile(
      appSettings,
      JSON.stringify({ ScenarioConfigurations: { Outbound: 'scenarios/outbound.json' } }),
    )

    expect(await loadScenarioSettings(appSettings, 'Outbound')).toEqual({
      RecipientEmailAddress: 'bob@home.internal',
    })
  })

  it('matches scenario and section names ignoring case', async () => {
    await fs.writeFile(
      path.join(dir, 'inbound.json'),
      JSON.stringify({ SenderEmailAddress: 'alice@home.internal' }),
    )
    const appSettings = path.join(dir, 'appsettings.json')
    await fs.writeFile(
      appSettings,
      JSON.stringify({ scenarioconfigurations: { INBOUND: 'inbound.json' } }),
    )

    expect(await loadScenarioSettings(appSettings, 'Inbound')).toEqual({
      SenderEmailAddress: 'alice@home.internal',
    })
  })

  it('rejects a scenario that is not mapped', async () => {
    const appSettings = path.join(dir, 'appsettings.json')
    await fs.writeFile(appSettings, JSON.stringify({ ScenarioConfigurations: {} }))

    const error: unknown = await loadScenarioSettings(appSettings, 'Inbound').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ConfigurationError)
    if (error instanceof ConfigurationError) {
      expect(error.setting).toBe('ScenarioConfigurations:Inbound')
    }
  })
})
