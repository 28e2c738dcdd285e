/**
 * Key pair generation by rejection sampling over prime pairs.
 */

import { KeyGenerationError } from '../errors.js'
import { assertPrime } from '../primes/primality.js'
import { RandomPrimeSupplier } from '../primes/random-supplier.js'
import type { KeyPair, KeyRejection, PrimeSupplier } from '../types.js'
import { validateKeyPair } from './key-pair.js'
import { DEFAULT_MAX_ATTEMPTS } from './types.js'
import type { GenerateKeyOptions } from './types.js'

/**
 * Draw prime pairs until one satisfies `gcd(e, λ) = 1` and `e < λ`.
 *
 * @remarks
 * A pair fails only when `λ` is a multiple of 65537 (or when both draws land
 * on the same prime), so the expected number of attempts is close to one.
 * The attempt cap is a safety valve; pass `Infinity` for an unbounded loop.
 *
 * @public
 */
export class KeyGenerator {
  readonly #primes: PrimeSupplier
  readonly #maxAttempts: number
  readonly #requireDistinctPrimes: boolean
  readonly #onReject: ((rejection: KeyRejection) => void) | undefined

  /** @throws {@link KeyGenerationError} if `maxAttempts` is not a positive integer or `Infinity`. */
  constructor(options: GenerateKeyOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    if (!(maxAttempts === Infinity || (Number.isInteger(maxAttempts) && maxAttempts > 0))) {
      throw new KeyGenerationError(
        `maxAttempts must be a positive integer or Infinity, got ${String(maxAttempts)}`,
        0,
      )
    }
    this.#primes = options.primes ?? new RandomPrimeSupplier()
    this.#maxAttempts = maxAttempts
    this.#requireDistinctPrimes = options.requireDistinctPrimes ?? true
    this.#onReject = options.onReject
  }

  /**
   * Return a valid `[p, q]`.
   *
   * @throws {@link PrimeSupplierError} if the supplier returns a non-prime or
   * out-of-range value.
   * @throws {@link KeyGenerationError} once `maxAttempts` pairs were rejected.
   */
  generate(): KeyPair {
    for (let attempt = 1; attempt <= this.#maxAttempts; attempt++) {
      const p = assertPrime(this.#primes.nextPrime())
      const q = assertPrime(this.#primes.nextPrime())

      const reason = validateKeyPair([p, q], {
        requireDistinctPrimes: this.#requireDistinctPrimes,
      })
      if (reason === undefined) {
        return [p, q]
      }
      this.#onReject?.({ attempt, p, q, reason })
    }

    throw new KeyGenerationError(
      `No valid key pair after ${String(this.#maxAttempts)} attempts`,
      this.#maxAttempts,
    )
  }
}

/**
 * Generate a private key `[p, q]` with the fixed public exponent.
 * @public
 */
export function genkey(options: GenerateKeyOptions = {}): KeyPair {
  return new KeyGenerator(options).generate()
}
