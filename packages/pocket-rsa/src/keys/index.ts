/**
 * Key generation barrel export.
 */

export { KeyGenerator, genkey } from './generator.js'
export {
  PUBLIC_EXPONENT,
  publicModulus,
  totient,
  validateKeyPair,
  derivePrivateExponent,
} from './key-pair.js'
export { DEFAULT_MAX_ATTEMPTS } from './types.js'
export type { GenerateKeyOptions, ValidateKeyPairOptions } from './types.js'
