/**
 * CLI entry point for sealpost.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { main } from './main.js'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
