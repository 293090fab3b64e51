/**
 * Command dispatch for the sealpost CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import(), so only the requested
 * command's module (and its dependencies) is loaded.
 *
 * @internal
 */

export const HELP_TEXT =
  'Usage: sealpost <command> [options]\n\n' +
  'Commands:\n' +
  '  encrypt        Encrypt and sign a file, or every file of the source folder\n' +
  '  decrypt        Decrypt and verify a file, or every file of the source folder\n' +
  '  test-secrets   Resolve both passphrases with the configured protection mode\n' +
  '  doctor         Run preflight checks\n'

function printHelp(): void {
  process.stdout.write(HELP_TEXT)
}

/**
 * Run the CLI with `argv` (the arguments after the script name) and return
 * the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const [subcommand, ...commandArgs] = argv

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'encrypt': {
      const { encryptCommand } = await import('./commands/encrypt.js')
      return encryptCommand(commandArgs)
    }
    case 'decrypt': {
      const { decryptCommand } = await import('./commands/decrypt.js')
      return decryptCommand(commandArgs)
    }
    case 'test-secrets': {
      const { testSecretsCommand } = await import('./commands/test-secrets.js')
      return testSecretsCommand(commandArgs)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}
