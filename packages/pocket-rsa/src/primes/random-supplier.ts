/**
 * Default prime supplier backed by a uniform random source.
 */

import * as crypto from 'node:crypto'
import type { Prime, PrimeSupplier, RandomSource } from '../types.js'
import { PRIME_LIMIT, PRIME_MIN, isPrime } from './primality.js'

/** Options for {@link RandomPrimeSupplier}. */
export interface RandomPrimeSupplierOptions {
  /**
   * Uniform integer source over `[min, max)`.
   * Defaults to `crypto.randomInt`.
   */
  random?: RandomSource | undefined
}

/**
 * Draw random candidates from `[2^31, 2^32)` until one is prime.
 *
 * @remarks
 * Even candidates are bumped to the next odd value; `2^32 - 1` is odd, so the
 * bump never leaves the range. Roughly one odd candidate in eleven is prime.
 *
 * @public
 */
export class RandomPrimeSupplier implements PrimeSupplier {
  readonly #random: RandomSource

  constructor(options: RandomPrimeSupplierOptions = {}) {
    this.#random = options.random ?? ((min: number, max: number) => crypto.randomInt(min, max))
  }

  nextPrime(): Prime {
    for (;;) {
      const drawn = this.#random(PRIME_MIN, PRIME_LIMIT)
      const candidate = drawn % 2 === 0 ? drawn + 1 : drawn
      if (isPrime(candidate)) {
        return candidate
      }
    }
  }
}
