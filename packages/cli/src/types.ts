import { GpgEngine, SettingKeys, optionalSetting } from 'sealpost'
import type { OpenPgpEngine, PassphraseResolverDeps, RuntimeSettings } from 'sealpost'

/** Settings sources accepted on the command line. */
export interface SettingsFlags {
  /** Path to a flat settings JSON file. */
  config?: string | undefined
  /** Path to an app-settings JSON mapping scenario names to settings files. */
  appsettings?: string | undefined
  /** Scenario to look up in `appsettings`. */
  scenario?: string | undefined
}

/** Collaborators of the commands that run a workflow. */
export interface CommandDeps {
  createEngine: (settings: RuntimeSettings) => OpenPgpEngine
  passphraseDeps?: PassphraseResolverDeps | undefined
}

/** gpg with the keystore named by `GnuPGHomeDir`, when set. */
export const defaultCommandDeps: CommandDeps = {
  createEngine: (settings) =>
    new GpgEngine({ homeDir: optionalSetting(settings, SettingKeys.gnupgHome) }),
}
