/**
 * Error hierarchy for pocket-rsa.
 *
 * Contract violations (zero modulus, overflow, broken key invariants) throw.
 * A missing modular inverse is an ordinary `undefined` result and never
 * appears here.
 *
 * @packageDocumentation
 */

/** Base error for all pocket-rsa errors. */
export class RsaError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RsaError'
  }
}

// --- Arithmetic Contract Violations ---

/**
 * Thrown when a modulus of zero reaches the arithmetic kernel. The result of
 * reducing by zero is undefined, so the operation is aborted.
 */
export class InvalidModulusError extends RsaError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidModulusError'
  }
}

/**
 * Thrown when a checked multiplication exceeds the accumulator width.
 */
export class ArithmeticOverflowError extends RsaError {
  /** Name of the operation whose product overflowed (e.g. `'modexp'`). */
  readonly operation: string

  /** The largest value the accumulator could hold. */
  readonly limit: bigint

  constructor(message: string, operation: string, limit: bigint) {
    super(message)
    this.name = 'ArithmeticOverflowError'
    this.operation = operation
    this.limit = limit
  }
}

/**
 * Thrown when a value does not fit the fixed-width unsigned domain it was
 * declared in.
 */
export class IntegerRangeError extends RsaError {
  /** The offending value, as given. */
  readonly value: bigint | number

  /** Bit width of the expected unsigned domain. */
  readonly width: 32 | 64

  constructor(message: string, value: bigint | number, width: 32 | 64) {
    super(message)
    this.name = 'IntegerRangeError'
    this.value = value
    this.width = width
  }
}

// --- Key Material Failures ---

/**
 * Thrown when a private key has no private exponent at decryption time.
 * Keys produced by the key generator never trigger this; it means the key pair
 * was built or altered elsewhere.
 */
export class KeyInvariantError extends RsaError {
  constructor(message: string) {
    super(message)
    this.name = 'KeyInvariantError'
  }
}

/**
 * Thrown when key generation gives up after its configured number of
 * attempts.
 */
export class KeyGenerationError extends RsaError {
  /** How many prime pairs were drawn and rejected. */
  readonly attempts: number

  constructor(message: string, attempts: number) {
    super(message)
    this.name = 'KeyGenerationError'
    this.attempts = attempts
  }
}

/**
 * Thrown when a prime supplier returns a value that is not a prime in
 * `[2^31, 2^32)`.
 */
export class PrimeSupplierError extends RsaError {
  /** The value the supplier returned. */
  readonly value: number

  constructor(message: string, value: number) {
    super(message)
    this.name = 'PrimeSupplierError'
    this.value = value
  }
}

// --- Infrastructure Failures ---

/** Thrown when a configuration file is unreadable or structurally invalid. */
export class ConfigError extends RsaError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
