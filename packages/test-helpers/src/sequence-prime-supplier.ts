/**
 * Table-backed prime supplier for testing.
 */

import { assertPrime } from 'pocket-rsa'
import type { PrimeSupplier } from 'pocket-rsa'

/**
 * Options for creating a {@link SequencePrimeSupplier}.
 * @public
 */
export interface SequencePrimeSupplierOptions {
  /** Start over from the first prime once the list is used up. Defaults to `false`. */
  cycle?: boolean | undefined
  /**
   * Check every value with `assertPrime` up front. Defaults to `true`; turn it
   * off to model a supplier that breaks its contract.
   */
  validate?: boolean | undefined
}

/**
 * A `PrimeSupplier` that hands out a fixed list of primes in order.
 *
 * @remarks
 * Key generation draws `p` then `q`, so a list `[a, b, c, d]` yields the
 * candidate pairs `(a, b)` and `(c, d)`.
 *
 * @example
 * ```ts
 * const primes = new SequencePrimeSupplier([2147483659, 2147483693])
 * const key = genkey({ primes })
 * ```
 *
 * @public
 */
export class SequencePrimeSupplier implements PrimeSupplier {
  readonly #primes: readonly number[]
  readonly #cycle: boolean
  #draws = 0

  constructor(primes: readonly number[], options: SequencePrimeSupplierOptions = {}) {
    if (primes.length === 0) {
      throw new Error('SequencePrimeSupplier needs at least one prime')
    }
    if (options.validate ?? true) {
      primes.forEach((p) => assertPrime(p))
    }
    this.#primes = [...primes]
    this.#cycle = options.cycle ?? false
  }

  /** @public */
  nextPrime(): number {
    if (!this.#cycle && this.#draws >= this.#primes.length) {
      throw new Error(`SequencePrimeSupplier exhausted after ${String(this.#primes.length)} primes`)
    }
    const value = this.#primes[this.#draws % this.#primes.length]
    if (value === undefined) {
      throw new Error('SequencePrimeSupplier index out of range')
    }
    this.#draws++
    return value
  }

  /**
   * How many primes have been handed out.
   * @public
   */
  get draws(): number {
    return this.#draws
  }

  /**
   * Start again from the first prime. Useful for test teardown.
   * @public
   */
  reset(): void {
    this.#draws = 0
  }
}
