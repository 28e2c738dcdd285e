/**
 * Modular arithmetic barrel export.
 */

export { modexp } from './modexp.js'
export { modInverse, gcd } from './inverse.js'
export { U32_MAX, U64_MAX, U128_MAX, assertU32, assertU64, checkedMul, toU32 } from './width.js'
