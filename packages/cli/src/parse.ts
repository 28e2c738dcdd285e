/**
 * Command-line integer parsing.
 *
 * @internal
 */

import { U32_MAX, U64_MAX } from 'pocket-rsa'

const DECIMAL = /^\d+$/

/** Parse a non-negative decimal integer no wider than `width` bits. */
function parseUnsigned(text: string, label: string, width: 32 | 64): bigint {
  if (!DECIMAL.test(text)) {
    throw new Error(`${label} must be a non-negative decimal integer, got "${text}"`)
  }
  const value = BigInt(text)
  if (value > (width === 32 ? U32_MAX : U64_MAX)) {
    throw new Error(`${label} does not fit in ${String(width)} bits: ${text}`)
  }
  return value
}

/** Parse a u32 argument such as a message or prime. */
export function parseU32(text: string, label: string): number {
  return Number(parseUnsigned(text, label, 32))
}

/** Parse a u64 argument such as a modulus or ciphertext. */
export function parseU64(text: string, label: string): bigint {
  return parseUnsigned(text, label, 64)
}
