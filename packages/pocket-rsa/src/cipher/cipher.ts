/**
 * Textbook RSA over single u32 messages.
 */

import { modexp } from '../arith/modexp.js'
import { assertU32, assertU64, toU32 } from '../arith/width.js'
import { PUBLIC_EXPONENT, derivePrivateExponent, publicModulus } from '../keys/key-pair.js'
import type { PrivateKey } from '../types.js'

/**
 * Encrypt `message` under the public modulus `n`.
 *
 * The caller guarantees `message < n`; a modulus built from two primes in
 * `[2^31, 2^32)` is always above every u32, so keys from `genkey()` satisfy
 * this.
 *
 * @throws {@link InvalidModulusError} if `n` is zero.
 * @throws {@link IntegerRangeError} if `message` is not a u32 or `n` not a u64.
 * @public
 */
export function encrypt(n: bigint, message: number): bigint {
  return modexp(assertU32(message, 'message'), PUBLIC_EXPONENT, assertU64(n, 'n'))
}

/**
 * Decrypt `ciphertext` with the private key `[p, q]`.
 *
 * @throws {@link KeyInvariantError} if the key has no private exponent.
 * @throws {@link IntegerRangeError} if the recovered value is wider than u32,
 * i.e. the ciphertext was not produced from a u32 message under this key.
 * @public
 */
export function decrypt(key: PrivateKey, ciphertext: bigint): number {
  const d = derivePrivateExponent(key)
  const plain = modexp(ciphertext, d, publicModulus(key))
  return toU32(plain, 'decrypted message')
}
