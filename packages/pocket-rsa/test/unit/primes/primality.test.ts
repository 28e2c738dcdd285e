import { describe, it, expect } from 'vitest'
import { PRIME_LIMIT, PRIME_MIN, assertPrime, isPrime } from '../../../src/primes/primality.js'
import { IntegerRangeError, PrimeSupplierError } from '../../../src/errors.js'

function isPrimeByTrialDivision(n: number): boolean {
  if (n < 2) return false
  for (let i = 2; i * i <= n; i++) {
    if (n % i === 0) return false
  }
  return true
}

describe('isPrime', () => {
  it('agrees with trial division below 5000', () => {
    for (let n = 0; n < 5000; n++) {
      expect(isPrime(n), `n = ${String(n)}`).toBe(isPrimeByTrialDivision(n))
    }
  })

  it('recognizes primes at the edges of the 32-bit range', () => {
    expect(isPrime(2147483647)).toBe(true)
    expect(isPrime(2147483659)).toBe(true)
    expect(isPrime(4294967291)).toBe(true)
  })

  it('rejects composites at the edges of the 32-bit range', () => {
    expect(isPrime(2147483648)).toBe(false)
    expect(isPrime(2147483649)).toBe(false)
    expect(isPrime(4294967295)).toBe(false)
  })

  it('rejects strong pseudoprimes to small bases', () => {
    // 151 * 751 * 28351
    expect(isPrime(3215031751)).toBe(false)
    // Carmichael numbers
    expect(isPrime(561)).toBe(false)
    expect(isPrime(41041)).toBe(false)
  })

  it('rejects values outside the u32 domain', () => {
    expect(() => isPrime(2 ** 32)).toThrow(IntegerRangeError)
    expect(() => isPrime(-3)).toThrow(IntegerRangeError)
    expect(() => isPrime(7.5)).toThrow(IntegerRangeError)
  })
})

describe('assertPrime', () => {
  it('returns primes inside [2^31, 2^32)', () => {
    expect(assertPrime(2147483659)).toBe(2147483659)
    expect(assertPrime(4294967291)).toBe(4294967291)
  })

  it('throws for primes below the range', () => {
    expect(() => assertPrime(97)).toThrow(PrimeSupplierError)
    expect(() => assertPrime(2147483647)).toThrow(
      'Supplied value 2147483647 is outside [2^31, 2^32)',
    )
  })

  it('throws for values at or above 2^32', () => {
    expect(() => assertPrime(PRIME_LIMIT)).toThrow(PrimeSupplierError)
  })

  it('throws for composites inside the range', () => {
    expect(() => assertPrime(PRIME_MIN + 1)).toThrow('Supplied value 2147483649 is not prime')
  })

  it('carries the offending value', () => {
    try {
      assertPrime(4)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(PrimeSupplierError)
      if (err instanceof PrimeSupplierError) {
        expect(err.value).toBe(4)
      }
    }
  })
})
