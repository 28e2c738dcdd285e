/**
 * Extended Euclidean algorithm and greatest common divisor.
 */

/**
 * Compute the multiplicative inverse of `a` modulo `m`.
 *
 * Only the Bézout coefficient of `a` is tracked. Returns `undefined` when
 * `m <= 0` or when `a` and `m` share a factor; the absence drives retries in
 * key generation and is not an error.
 *
 * @returns `x` in `[0, m)` with `(a * x) % m === 1n`, or `undefined`.
 * @public
 */
export function modInverse(a: bigint, m: bigint): bigint | undefined {
  if (m <= 0n) {
    return undefined
  }

  let t = 0n
  let newT = 1n
  let r = m
  // Negative inputs are brought into [0, m) first; non-negative ones are unchanged.
  let newR = a < 0n ? (a % m) + m : a

  while (newR !== 0n) {
    const quotient = r / newR
    ;[t, newT] = [newT, t - quotient * newT]
    ;[r, newR] = [newR, r - quotient * newR]
  }

  if (r > 1n) {
    return undefined
  }

  // |t| < m at this point, so one shift is enough.
  if (t < 0n) {
    t += m
  }
  return t
}

/**
 * Greatest common divisor of two non-negative integers.
 * @public
 */
export function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) {
    ;[a, b] = [b, a % b]
  }
  return a
}
