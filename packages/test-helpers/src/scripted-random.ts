/**
 * Deterministic random source for testing.
 */

import type { RandomSource } from 'pocket-rsa'

/**
 * Create a `RandomSource` that returns `values` in order and throws once they
 * run out. The requested range is checked against every value.
 *
 * @example
 * ```ts
 * const supplier = new RandomPrimeSupplier({ random: scriptedRandom([2147483658]) })
 * supplier.nextPrime() // 2147483659
 * ```
 *
 * @public
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let index = 0
  return (min, max) => {
    const value = values[index]
    if (value === undefined) {
      throw new Error(`scriptedRandom exhausted after ${String(values.length)} values`)
    }
    if (value < min || value >= max) {
      throw new Error(
        `scriptedRandom value ${String(value)} is outside [${String(min)}, ${String(max)})`,
      )
    }
    index++
    return value
  }
}
