import { parseArgs } from 'node:util'
import { CryptoWorkflow } from 'sealpost'
import { bold, formatError, statusIcon } from '../output.js'
import { SETTINGS_USAGE, loadCliSettings } from '../settings.js'
import { defaultCommandDeps } from '../types.js'
import type { CommandDeps } from '../types.js'

export async function testSecretsCommand(
  args: string[],
  deps: CommandDeps = defaultCommandDeps,
): Promise<number> {
  try {
    const { values } = parseArgs({
      args,
      options: {
        config: { type: 'string' },
        appsettings: { type: 'string' },
        scenario: { type: 'string' },
      },
      strict: true,
    })
    const settings = await loadCliSettings(values)
    const workflow = new CryptoWorkflow({
      settings,
      engine: deps.createEngine(settings),
      passphraseDeps: deps.passphraseDeps,
    })

    const checks = await workflow.testSecrets()
    for (const { role, result } of checks) {
      if (result.ok) {
        process.stdout.write(`  ${statusIcon(true)} ${bold(role)} passphrase resolved\n`)
      } else {
        process.stdout.write(`  ${statusIcon(false)} ${bold(role)}: ${result.error.message}\n`)
      }
    }
    return checks.every(({ result }) => result.ok) ? 0 : 1
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(`Usage: sealpost test-secrets ${SETTINGS_USAGE}\n`)
    return 1
  }
}
