/**
 * @pocket-rsa/test-helpers — Test utilities for pocket-rsa consumers.
 *
 * @packageDocumentation
 */

export { SequencePrimeSupplier } from './sequence-prime-supplier.js'
export type { SequencePrimeSupplierOptions } from './sequence-prime-supplier.js'
export { scriptedRandom } from './scripted-random.js'
