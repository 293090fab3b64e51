/**
 * The `sealpost decrypt` command. A file whose sender cannot be
 * authenticated is deleted and counts as a failure.
 *
 * @internal
 */

import { defaultCommandDeps } from '../types.js'
import type { CommandDeps } from '../types.js'
import { transferCommand } from './transfer.js'

export function decryptCommand(args: string[], deps: CommandDeps = defaultCommandDeps): Promise<number> {
  return transferCommand('decrypt', args, deps)
}
