/**
 * Settings loading for the command line.
 *
 * @internal
 */

import { ConfigurationError, loadScenarioSettings, loadSettingsFile } from 'sealpost'
import type { RuntimeSettings } from 'sealpost'
import type { SettingsFlags } from './types.js'

/** Usage fragment shared by the commands that read settings. */
export const SETTINGS_USAGE = '--config <file> | --appsettings <file> --scenario <name>'

/**
 * Load settings from `--config`, or from `--appsettings` and `--scenario`.
 * @throws ConfigurationError if neither source is given or loading fails
 */
export async function loadCliSettings(flags: SettingsFlags): Promise<RuntimeSettings> {
  if (flags.config !== undefined) {
    return loadSettingsFile(flags.config)
  }
  if (flags.appsettings !== undefined && flags.scenario !== undefined) {
    return loadScenarioSettings(flags.appsettings, flags.scenario)
  }
  throw new ConfigurationError(
    `Settings source required: ${SETTINGS_USAGE}`,
    flags.appsettings !== undefined ? '--scenario' : '--config',
  )
}
