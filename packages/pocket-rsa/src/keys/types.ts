/**
 * Key generation types for pocket-rsa.
 */

import type { KeyRejection, PrimeSupplier } from '../types.js'

/**
 * Options accepted by `genkey()` and {@link KeyGenerator}.
 * @public
 */
export interface GenerateKeyOptions {
  /** Where primes come from. Defaults to a `RandomPrimeSupplier`. */
  primes?: PrimeSupplier | undefined
  /**
   * How many prime pairs may be drawn before giving up with
   * `KeyGenerationError`. `Infinity` keeps retrying forever.
   * Defaults to {@link DEFAULT_MAX_ATTEMPTS}.
   */
  maxAttempts?: number | undefined
  /** Reject pairs where `p === q`. Defaults to `true`. */
  requireDistinctPrimes?: boolean | undefined
  /** Called once for every discarded pair, before the next draw. */
  onReject?: ((rejection: KeyRejection) => void) | undefined
}

/**
 * Options accepted by `validateKeyPair()`.
 * @public
 */
export interface ValidateKeyPairOptions {
  /** Treat `p === q` as invalid. Defaults to `true`. */
  requireDistinctPrimes?: boolean | undefined
}

/** Default retry cap for key generation. */
export const DEFAULT_MAX_ATTEMPTS = 10_000
