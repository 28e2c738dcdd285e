/**
 * pocket-rsa — Textbook RSA on fixed-width integers.
 *
 * @packageDocumentation
 */

export {
  RsaError,
  InvalidModulusError,
  ArithmeticOverflowError,
  IntegerRangeError,
  KeyInvariantError,
  KeyGenerationError,
  PrimeSupplierError,
  ConfigError,
} from './errors.js'

export type {
  Prime,
  KeyPair,
  PrivateKey,
  PrimeSupplier,
  RandomSource,
  KeyRejection,
  KeyRejectionReason,
  KeygenConfig,
  RsaConfig,
} from './types.js'

export { modexp, modInverse, gcd, U32_MAX, U64_MAX, U128_MAX } from './arith/index.js'

export { isPrime, assertPrime, PRIME_MIN, PRIME_LIMIT, RandomPrimeSupplier } from './primes/index.js'
export type { RandomPrimeSupplierOptions } from './primes/index.js'

export {
  KeyGenerator,
  genkey,
  PUBLIC_EXPONENT,
  DEFAULT_MAX_ATTEMPTS,
  publicModulus,
  totient,
  validateKeyPair,
  derivePrivateExponent,
} from './keys/index.js'
export type { GenerateKeyOptions, ValidateKeyPairOptions } from './keys/index.js'

export { encrypt, decrypt } from './cipher/index.js'

export { loadConfig, getDefaultConfigDir, defaultConfig, validateConfig, keygenOptions } from './config.js'
