/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import type { KeyRejection } from 'pocket-rsa'

type OutputStream = NodeJS.WriteStream

/** Check if the stream is a TTY at call time (not module load time). */
function isTTY(stream: OutputStream): boolean {
  return stream.isTTY ?? false
}

/** Wrap text in ANSI bold if the stream (stdout by default) is a TTY. */
export function bold(text: string, stream: OutputStream = process.stdout): string {
  return isTTY(stream) ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if the stream (stdout by default) is a TTY. */
export function dim(text: string, stream: OutputStream = process.stdout): string {
  return isTTY(stream) ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/**
 * Render `label: value` lines, one per field, each ending in a newline.
 * Labels are bolded on a TTY.
 */
export function formatFields(fields: readonly (readonly [string, bigint | number | string])[]): string {
  return fields.map(([label, value]) => `${bold(`${label}:`)} ${String(value)}\n`).join('')
}

/** Describe a discarded prime pair for `genkey --verbose`. */
export function formatRejection(rejection: KeyRejection): string {
  const { attempt, p, q, reason } = rejection
  return `attempt ${String(attempt)}: rejected (${String(p)}, ${String(q)}): ${reason}`
}
