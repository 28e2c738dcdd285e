/**
 * Fixed-width unsigned integer helpers.
 *
 * Values are carried as `bigint`, which never wraps. These helpers put the
 * u32/u64/u128 boundaries back so that every value the kernel touches stays in
 * the width it was declared in.
 */

import { ArithmeticOverflowError, IntegerRangeError } from '../errors.js'

export const U32_MAX = 0xffff_ffffn
export const U64_MAX = 0xffff_ffff_ffff_ffffn
export const U128_MAX = (1n << 128n) - 1n

/**
 * Check that `value` is an integer in `[0, 2^32)` and return it as a bigint.
 * @internal
 */
export function assertU32(value: bigint | number, label: string): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new IntegerRangeError(`${label} must be an integer, got ${String(value)}`, value, 32)
  }
  const wide = BigInt(value)
  if (wide < 0n || wide > U32_MAX) {
    throw new IntegerRangeError(`${label} does not fit in 32 bits: ${String(value)}`, value, 32)
  }
  return wide
}

/**
 * Check that `value` is an integer in `[0, 2^64)`.
 * @internal
 */
export function assertU64(value: bigint, label: string): bigint {
  if (value < 0n || value > U64_MAX) {
    throw new IntegerRangeError(`${label} does not fit in 64 bits: ${String(value)}`, value, 64)
  }
  return value
}

/**
 * Multiply two non-negative values, failing instead of exceeding `limit`.
 *
 * @throws {@link ArithmeticOverflowError} when `a * b > limit`.
 * @internal
 */
export function checkedMul(a: bigint, b: bigint, limit: bigint, operation: string): bigint {
  const product = a * b
  if (product > limit) {
    throw new ArithmeticOverflowError(
      `${operation}: product ${String(product)} exceeds ${String(limit)}`,
      operation,
      limit,
    )
  }
  return product
}

/**
 * Narrow a value known to be in the u64 domain down to a u32 number.
 * @internal
 */
export function toU32(value: bigint, label: string): number {
  return Number(assertU32(value, label))
}
