import { describe, it, expect, vi } from 'vitest'
import { RandomPrimeSupplier } from '../../../src/primes/random-supplier.js'
import { PRIME_LIMIT, PRIME_MIN, isPrime } from '../../../src/primes/primality.js'

describe('RandomPrimeSupplier', () => {
  it('asks the random source for values in [2^31, 2^32)', () => {
    const random = vi.fn(() => 2147483658)
    const supplier = new RandomPrimeSupplier({ random })
    supplier.nextPrime()
    expect(random).toHaveBeenCalledWith(PRIME_MIN, PRIME_LIMIT)
  })

  it('bumps even draws to the next odd candidate', () => {
    // 2147483658 + 1 = 2147483659 is prime
    const supplier = new RandomPrimeSupplier({ random: () => 2147483658 })
    expect(supplier.nextPrime()).toBe(2147483659)
  })

  it('keeps drawing until a candidate is prime', () => {
    const draws = [2147483648, 2147483651, 2147483693]
    const random = vi.fn(() => draws.shift() ?? 0)
    const supplier = new RandomPrimeSupplier({ random })
    expect(supplier.nextPrime()).toBe(2147483693)
    expect(random).toHaveBeenCalledTimes(3)
  })

  it('never leaves the range at the top edge', () => {
    // 2^32 - 1 is odd and composite; 2^32 - 5 is prime
    const draws = [4294967295, 4294967290]
    const supplier = new RandomPrimeSupplier({ random: () => draws.shift() ?? 0 })
    expect(supplier.nextPrime()).toBe(4294967291)
  })

  it('returns primes in range with the default random source', () => {
    const supplier = new RandomPrimeSupplier()
    for (let i = 0; i < 50; i++) {
      const p = supplier.nextPrime()
      expect(p).toBeGreaterThanOrEqual(PRIME_MIN)
      expect(p).toBeLessThan(PRIME_LIMIT)
      expect(isPrime(p)).toBe(true)
    }
  })
})
