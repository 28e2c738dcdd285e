/**
 * Prime supply barrel export.
 */

export { isPrime, assertPrime, PRIME_MIN, PRIME_LIMIT } from './primality.js'
export { RandomPrimeSupplier } from './random-supplier.js'
export type { RandomPrimeSupplierOptions } from './random-supplier.js'
