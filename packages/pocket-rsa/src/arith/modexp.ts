/**
 * Modular exponentiation over the u64 domain.
 */

import { InvalidModulusError } from '../errors.js'
import { U128_MAX, assertU64, checkedMul } from './width.js'

/**
 * Compute `base^exponent mod modulus` by square-and-multiply.
 *
 * @remarks
 * Inputs are u64. Every intermediate product is formed in a u128 accumulator
 * through {@link checkedMul}: both factors are below `2^64`, so the square of
 * `modulus - 1` always fits and an overflow can only mean a broken width
 * invariant. The result is in `[0, modulus)`.
 *
 * @throws {@link InvalidModulusError} if `modulus` is zero.
 * @throws {@link IntegerRangeError} if an input is outside the u64 domain.
 * @throws {@link ArithmeticOverflowError} if a product exceeds u128.
 * @public
 */
export function modexp(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus === 0n) {
    throw new InvalidModulusError('modexp: modulus must not be zero')
  }
  let x = assertU64(base, 'base')
  let y = assertU64(exponent, 'exponent')
  const m = assertU64(modulus, 'modulus')

  // 1 % m so that a modulus of 1 yields 0 even for a zero exponent.
  let z = 1n % m

  while (y > 0n) {
    if (y % 2n === 1n) {
      z = checkedMul(z, x, U128_MAX, 'modexp') % m
    }
    y /= 2n
    x = checkedMul(x, x, U128_MAX, 'modexp') % m
  }

  return assertU64(z, 'modexp result')
}
