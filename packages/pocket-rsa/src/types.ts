/**
 * Shared types and interfaces for pocket-rsa.
 */

/**
 * A 32-bit unsigned prime in `[2^31, 2^32)`.
 *
 * Primes are plain numbers; every u32 is exactly representable as a double.
 */
export type Prime = number

/**
 * A private key: two primes `[p, q]`. The public modulus is `p * q`.
 */
export type KeyPair = readonly [p: Prime, q: Prime]

/** Alias used where a key pair is consumed as the private half. */
export type PrivateKey = KeyPair

/** Source of primes consumed by the key generator. */
export interface PrimeSupplier {
  /** Return a prime in `[2^31, 2^32)`. */
  nextPrime(): Prime
}

/**
 * Uniform integer source over the half-open range `[min, max)`.
 * Matches the signature of `crypto.randomInt(min, max)`.
 */
export type RandomSource = (min: number, max: number) => number

/** Why the key generator discarded a prime pair. */
export type KeyRejectionReason = 'no-inverse' | 'exponent-too-large' | 'not-coprime' | 'equal-primes'

/** A single discarded prime pair, reported through `onReject`. */
export interface KeyRejection {
  /** 1-based index of the attempt that drew this pair. */
  attempt: number
  p: Prime
  q: Prime
  reason: KeyRejectionReason
}

/** Key generation section of the configuration file. */
export interface KeygenConfig {
  /** Retry cap; `null` leaves the retry loop unbounded. */
  maxAttempts: number | null
  /** Reject pairs where `p === q`. */
  requireDistinctPrimes: boolean
}

/** Top-level pocket-rsa configuration. */
export interface RsaConfig {
  version: 1
  keygen: KeygenConfig
}
