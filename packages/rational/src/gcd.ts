import { primes, sharedPrimeCache, type PrimeCache } from "./primes.js";

/**
 * Greatest common divisor of two non-negative bigints, by dividing out the
 * shared prime factors in ascending order.
 *
 * gcd(0, n) is n.
 */
export function gcd(a: bigint, b: bigint, cache: PrimeCache = sharedPrimeCache()): bigint {
  if (a < 0n || b < 0n) {
    throw new RangeError("gcd: arguments must be non-negative");
  }
  if (a === 0n) return b;
  if (b === 0n) return a;

  let lowest = a < b ? a : b;
  let highest = a < b ? b : a;
  let result = 1n;

  for (const p of primes(cache)) {
    if (lowest / p < 1n) break;

    while (lowest % p === 0n && highest % p === 0n) {
      lowest /= p;
      highest /= p;
      result *= p;
    }
  }

  return result;
}
