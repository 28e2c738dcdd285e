/**
 * Quantities derived from a key pair.
 */

import { gcd, modInverse } from '../arith/inverse.js'
import { U64_MAX, assertU32, checkedMul } from '../arith/width.js'
import { KeyInvariantError } from '../errors.js'
import type { KeyPair, KeyRejectionReason } from '../types.js'
import type { ValidateKeyPairOptions } from './types.js'

/** The fixed public exponent `e`. */
export const PUBLIC_EXPONENT = 65_537n

/**
 * Public modulus `n = p * q`. Two u32 factors always fit in u64.
 * @public
 */
export function publicModulus(key: KeyPair): bigint {
  const [p, q] = key
  return checkedMul(assertU32(p, 'p'), assertU32(q, 'q'), U64_MAX, 'publicModulus')
}

/**
 * Totient `λ = (p - 1)(q - 1)`. Recomputed on every call.
 * @public
 */
export function totient(key: KeyPair): bigint {
  const [p, q] = key
  const pMinusOne = assertU32(p, 'p') - 1n
  const qMinusOne = assertU32(q, 'q') - 1n
  if (pMinusOne < 0n || qMinusOne < 0n) {
    return 0n
  }
  return checkedMul(pMinusOne, qMinusOne, U64_MAX, 'totient')
}

/**
 * Check a key pair against the acceptance rules of key generation.
 *
 * Primality of `p` and `q` is not re-examined here; the key generator checks
 * supplier output before it calls this.
 *
 * @returns The first rule the pair breaks, or `undefined` if it is usable.
 * @public
 */
export function validateKeyPair(
  key: KeyPair,
  options: ValidateKeyPairOptions = {},
): KeyRejectionReason | undefined {
  const lambda = totient(key)

  if (modInverse(PUBLIC_EXPONENT, lambda) === undefined) {
    return 'no-inverse'
  }
  if (PUBLIC_EXPONENT >= lambda) {
    return 'exponent-too-large'
  }
  // Implied by the inverse existing; kept as a second guard.
  if (gcd(PUBLIC_EXPONENT, lambda) !== 1n) {
    return 'not-coprime'
  }
  if ((options.requireDistinctPrimes ?? true) && key[0] === key[1]) {
    return 'equal-primes'
  }
  return undefined
}

/**
 * Private exponent `d = e^-1 mod λ`.
 *
 * @throws {@link KeyInvariantError} if `e` has no inverse modulo the totient,
 * which never happens for a pair returned by the key generator.
 * @public
 */
export function derivePrivateExponent(key: KeyPair): bigint {
  const d = modInverse(PUBLIC_EXPONENT, totient(key))
  if (d === undefined) {
    throw new KeyInvariantError(
      `Public exponent ${String(PUBLIC_EXPONENT)} has no inverse for key (${String(key[0])}, ${String(key[1])})`,
    )
  }
  return d
}
