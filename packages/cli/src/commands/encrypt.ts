/**
 * The `sealpost encrypt` command.
 *
 * @internal
 */

import { defaultCommandDeps } from '../types.js'
import type { CommandDeps } from '../types.js'
import { transferCommand } from './transfer.js'

export function encryptCommand(args: string[], deps: CommandDeps = defaultCommandDeps): Promise<number> {
  return transferCommand('encrypt', args, deps)
}
