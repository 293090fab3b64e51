/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { EncryptionRecipientError } from 'sealpost'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

function ansi(open: number, close: number, text: string): string {
  return isTTY() ? `\x1b[${String(open)}m${text}\x1b[${String(close)}m` : text
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return ansi(1, 22, text)
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return ansi(2, 22, text)
}

/** `✓` in green or `✗` in red. */
export function statusIcon(ok: boolean): string {
  return ok ? ansi(32, 39, '✓') : ansi(31, 39, '✗')
}

/**
 * Format an error for display on stderr. Rejected recipients are listed one
 * per line below the message.
 */
export function formatError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err)
  }
  const headline = `${err.name}: ${err.message}`
  if (err instanceof EncryptionRecipientError) {
    const lines = err.invalidRecipients.map(
      (invalid) => `    ${invalid.fingerprint}: ${invalid.reason}`,
    )
    return [headline, ...lines].join('\n')
  }
  return headline
}
