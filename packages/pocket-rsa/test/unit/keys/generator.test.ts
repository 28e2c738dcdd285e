import { describe, it, expect, vi } from 'vitest'
import { KeyGenerator, genkey } from '../../../src/keys/generator.js'
import { PUBLIC_EXPONENT, totient } from '../../../src/keys/key-pair.js'
import { gcd } from '../../../src/arith/inverse.js'
import { PRIME_LIMIT, PRIME_MIN, isPrime } from '../../../src/primes/primality.js'
import { KeyGenerationError, PrimeSupplierError, RsaError } from '../../../src/errors.js'
import type { KeyRejection } from '../../../src/types.js'
import { FixedPrimes, P1, P2, P_BAD } from '../../helpers/primes.js'

// ---------------------------------------------------------------------------
// Scripted prime supply
// ---------------------------------------------------------------------------

describe('KeyGenerator with scripted primes', () => {
  it('returns the first valid pair', () => {
    const primes = new FixedPrimes([P1, P2])
    expect(new KeyGenerator({ primes }).generate()).toEqual([P1, P2])
    expect(primes.draws).toBe(2)
  })

  it('retries after a pair without an inverse', () => {
    const primes = new FixedPrimes([P_BAD, P2, P1, P2])
    const onReject = vi.fn<(rejection: KeyRejection) => void>()
    const key = new KeyGenerator({ primes, onReject }).generate()

    expect(key).toEqual([P1, P2])
    expect(primes.draws).toBe(4)
    expect(onReject).toHaveBeenCalledTimes(1)
    expect(onReject).toHaveBeenCalledWith({ attempt: 1, p: P_BAD, q: P2, reason: 'no-inverse' })
  })

  it('rejects equal primes by default', () => {
    const primes = new FixedPrimes([P1, P1, P2, P1])
    const rejections: KeyRejection[] = []
    const key = new KeyGenerator({ primes, onReject: (r) => rejections.push(r) }).generate()

    expect(key).toEqual([P2, P1])
    expect(rejections).toEqual([{ attempt: 1, p: P1, q: P1, reason: 'equal-primes' }])
  })

  it('accepts equal primes when distinctness is not required', () => {
    const primes = new FixedPrimes([P1])
    const key = new KeyGenerator({ primes, requireDistinctPrimes: false }).generate()
    expect(key).toEqual([P1, P1])
  })

  it('gives up with KeyGenerationError after maxAttempts', () => {
    const primes = new FixedPrimes([P_BAD, P2])
    const onReject = vi.fn<(rejection: KeyRejection) => void>()
    const generator = new KeyGenerator({ primes, maxAttempts: 3, onReject })

    expect(() => generator.generate()).toThrow(KeyGenerationError)
    expect(onReject).toHaveBeenCalledTimes(3)
    expect(onReject).toHaveBeenLastCalledWith({ attempt: 3, p: P_BAD, q: P2, reason: 'no-inverse' })
  })

  it('reports the attempt count on KeyGenerationError', () => {
    const generator = new KeyGenerator({ primes: new FixedPrimes([P_BAD]), maxAttempts: 5 })
    try {
      generator.generate()
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(KeyGenerationError)
      if (err instanceof KeyGenerationError) {
        expect(err.attempts).toBe(5)
        expect(err.message).toBe('No valid key pair after 5 attempts')
      }
    }
  })

  it('keeps retrying without a cap when maxAttempts is Infinity', () => {
    const bad = Array.from({ length: 40 }, () => P_BAD)
    const primes = new FixedPrimes([...bad, P1, P2])
    const key = new KeyGenerator({ primes, maxAttempts: Infinity }).generate()
    expect(key).toEqual([P1, P2])
    expect(primes.draws).toBe(42)
  })

  it('throws PrimeSupplierError when the supplier returns a non-prime', () => {
    const primes = new FixedPrimes([P1, 2147483649])
    expect(() => new KeyGenerator({ primes }).generate()).toThrow(PrimeSupplierError)
  })

  it('throws PrimeSupplierError when the supplier returns a small prime', () => {
    const primes = new FixedPrimes([101, P2])
    expect(() => new KeyGenerator({ primes }).generate()).toThrow(
      'Supplied value 101 is outside [2^31, 2^32)',
    )
  })
})

// ---------------------------------------------------------------------------
// Option validation
// ---------------------------------------------------------------------------

describe('KeyGenerator options', () => {
  it('rejects a non-positive maxAttempts', () => {
    expect(() => new KeyGenerator({ maxAttempts: 0 })).toThrow(KeyGenerationError)
    expect(() => new KeyGenerator({ maxAttempts: -1 })).toThrow(KeyGenerationError)
  })

  it('reports an invalid maxAttempts as an RsaError with no attempts made', () => {
    try {
      new KeyGenerator({ maxAttempts: Number.NaN })
      expect.unreachable('constructor should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(RsaError)
      expect(err).toBeInstanceOf(KeyGenerationError)
      if (err instanceof KeyGenerationError) {
        expect(err.attempts).toBe(0)
        expect(err.message).toBe('maxAttempts must be a positive integer or Infinity, got NaN')
      }
    }
  })

  it('rejects a fractional maxAttempts', () => {
    expect(() => new KeyGenerator({ maxAttempts: 2.5 })).toThrow(
      'maxAttempts must be a positive integer or Infinity, got 2.5',
    )
  })
})

// ---------------------------------------------------------------------------
// Random prime supply
// ---------------------------------------------------------------------------

describe('genkey', () => {
  it('returns pairs that satisfy every key invariant', () => {
    for (let i = 0; i < 100; i++) {
      const [p, q] = genkey()
      for (const prime of [p, q]) {
        expect(isPrime(prime)).toBe(true)
        expect(prime).toBeGreaterThanOrEqual(PRIME_MIN)
        expect(prime).toBeLessThan(PRIME_LIMIT)
      }
      expect(p).not.toBe(q)
      const lambda = totient([p, q])
      expect(PUBLIC_EXPONENT < lambda).toBe(true)
      expect(gcd(PUBLIC_EXPONENT, lambda)).toBe(1n)
    }
  })

  it('passes options through to the generator', () => {
    expect(genkey({ primes: new FixedPrimes([P2, P1]) })).toEqual([P2, P1])
  })
})
