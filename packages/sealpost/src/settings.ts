/**
 * Runtime settings: loading, flattening and validated access.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ConfigurationError } from './errors.js'
import type { Role, RuntimeSettings } from './types.js'

/** Well-known settings keys. */
export const SettingKeys = {
  senderEmail: 'SenderEmailAddress',
  recipientEmail: 'RecipientEmailAddress',
  passphraseProtectionMode: 'PassphraseProtectionMode',
  entropy: 'entropy',
  certificateSubjectName: 'SSLCertDistinguishedSubjectName',
  sourceFolder: 'SourceFolderPath',
  destinationFolder: 'DestinationFolderPath',
  archiveFolder: 'ArchiveFolderPath',
  awsRegion: 'AWSRegion',
  gnupgHome: 'GnuPGHomeDir',
  aspNetDpapiHelper: 'AspNetDpapiHelperCommand',
} as const

/** `{Role}AWSSecretsName` */
export function awsSecretsNameKey(role: Role): string {
  return `${role}AWSSecretsName`
}

/** `{Role}EncryptedSecretPassPhrase_WIND_DPAPI` */
export function windowsDpapiSecretKey(role: Role): string {
  return `${role}EncryptedSecretPassPhrase_WIND_DPAPI`
}

/** `{Role}EncryptedSecretPassPhrase_ASP_DPAPI` */
export function aspNetDpapiSecretKey(role: Role): string {
  return `${role}EncryptedSecretPassPhrase_ASP_DPAPI`
}

/**
 * Return the trimmed value of a setting.
 * @throws {@link ConfigurationError} if the setting is absent or blank
 */
export function requireSetting(settings: RuntimeSettings, key: string): string {
  const value = optionalSetting(settings, key)
  if (value === undefined) {
    throw new ConfigurationError(`${key} not configured`, key)
  }
  return value
}

/**
 * Return the value of a setting exactly as configured.
 * @throws {@link ConfigurationError} if the setting is absent or blank
 */
export function requireRawSetting(settings: RuntimeSettings, key: string): string {
  const value = Object.hasOwn(settings, key) ? settings[key] : undefined
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`${key} not configured`, key)
  }
  return value
}

/** Return the trimmed value of a setting, or `undefined` if absent or blank. */
export function optionalSetting(settings: RuntimeSettings, key: string): string | undefined {
  if (!Object.hasOwn(settings, key)) {
    return undefined
  }
  const value = settings[key]
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  return value.trim()
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Section and key names in app-settings files are case-insensitive.
function findIgnoringCase(record: Record<string, unknown>, name: string): unknown {
  const wanted = name.toLowerCase()
  const entry = Object.entries(record).find(([key]) => key.toLowerCase() === wanted)
  return entry?.[1]
}

function flattenInto(value: unknown, key: string, result: Record<string, string>): void {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    result[key] = String(value)
    return
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => {
      flattenInto(item, String(index), result)
    })
    return
  }
  if (isObject(value)) {
    for (const [childKey, child] of Object.entries(value)) {
      flattenInto(child, childKey, result)
    }
  }
  // null leaves carry no value
}

/**
 * Flatten parsed JSON into runtime settings.
 *
 * @remarks
 * Every scalar leaf is stored under its own key, not under its full path, so
 * `{ "Folders": { "SourceFolderPath": "/in" } }` yields
 * `{ SourceFolderPath: "/in" }`. Array items are keyed by index. When two
 * leaves share a key the later one wins.
 */
export function flattenSettings(json: unknown): Record<string, string> {
  if (!isObject(json)) {
    throw new ConfigurationError('Settings must be a JSON object', '<root>')
  }
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(json)) {
    flattenInto(value, key, result)
  }
  return result
}

async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(`Configuration file [${filePath}] NOT FOUND!`, filePath, {
      cause: error,
    })
  }

  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration file at ${filePath}`, filePath, {
      cause: error,
    })
  }
}

/**
 * Load a JSON settings file and flatten it into {@link RuntimeSettings}.
 *
 * @throws {@link ConfigurationError} if the file is missing or not valid JSON
 */
export async function loadSettingsFile(filePath: string): Promise<RuntimeSettings> {
  const parsed = await readJsonFile(filePath)
  return Object.freeze(flattenSettings(parsed))
}

/**
 * Load the settings of a named scenario.
 *
 * @remarks
 * The app-settings file maps scenario names to settings files under
 * `ScenarioConfigurations`. Relative paths resolve against the directory of
 * the app-settings file.
 *
 * @throws {@link ConfigurationError} if the scenario is not mapped
 */
export async function loadScenarioSettings(
  appSettingsPath: string,
  scenario: string,
): Promise<RuntimeSettings> {
  const appSettings = await readJsonFile(appSettingsPath)
  const scenarios = isObject(appSettings)
    ? findIgnoringCase(appSettings, 'ScenarioConfigurations')
    : undefined
  const mapped = isObject(scenarios) ? findIgnoringCase(scenarios, scenario) : undefined
  if (typeof mapped !== 'string' || mapped.trim() === '') {
    throw new ConfigurationError(
      `Scenario [${scenario}] is not mapped under ScenarioConfigurations in ${appSettingsPath}`,
      `ScenarioConfigurations:${scenario}`,
    )
  }
  const settingsPath = path.resolve(path.dirname(appSettingsPath), mapped.trim())
  return loadSettingsFile(settingsPath)
}
