/**
 * Primality testing for the 32-bit domain.
 */

import { modexp } from '../arith/modexp.js'
import { assertU32 } from '../arith/width.js'
import { PrimeSupplierError } from '../errors.js'

/** Smallest value a prime supplier may return (`2^31`). */
export const PRIME_MIN = 2 ** 31

/** Exclusive upper bound for supplied primes (`2^32`). */
export const PRIME_LIMIT = 2 ** 32

const SMALL_PRIMES = [2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31, 37, 41, 43, 47, 53, 59, 61]

// Witnesses 2, 7 and 61 decide every n < 4,759,123,141, which covers u32.
const WITNESSES = [2n, 7n, 61n]

/**
 * Deterministic Miller-Rabin test for a u32.
 *
 * @throws {@link IntegerRangeError} if `n` is not a u32.
 * @public
 */
export function isPrime(n: number): boolean {
  const wide = assertU32(n, 'n')
  if (n < 2) {
    return false
  }
  for (const p of SMALL_PRIMES) {
    if (n % p === 0) {
      return n === p
    }
  }

  let d = wide - 1n
  let s = 0
  while (d % 2n === 0n) {
    d /= 2n
    s++
  }

  const nMinusOne = wide - 1n
  witness: for (const a of WITNESSES) {
    let x = modexp(a, d, wide)
    if (x === 1n || x === nMinusOne) {
      continue
    }
    for (let i = 1; i < s; i++) {
      x = modexp(x, 2n, wide)
      if (x === nMinusOne) {
        continue witness
      }
    }
    return false
  }
  return true
}

/**
 * Check that a supplier kept its contract: an integer prime in
 * `[2^31, 2^32)`.
 *
 * @throws {@link PrimeSupplierError} otherwise.
 * @public
 */
export function assertPrime(value: number): number {
  if (!Number.isInteger(value) || value < PRIME_MIN || value >= PRIME_LIMIT) {
    throw new PrimeSupplierError(
      `Supplied value ${String(value)} is outside [2^31, 2^32)`,
      value,
    )
  }
  if (!isPrime(value)) {
    throw new PrimeSupplierError(`Supplied value ${String(value)} is not prime`, value)
  }
  return value
}
