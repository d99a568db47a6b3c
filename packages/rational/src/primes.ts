/**
 * Prime Cache
 *
 * Memoized, append-only sequence of primes found by trial division against the
 * primes already known. Backs the GCD used by rational normalization.
 *
 * @example
 * ```typescript
 * const cache = new PrimeCache();
 * cache.at(4); // 11n
 *
 * for (const p of primes()) {
 *   if (p > 10n) break;
 * }
 * ```
 */

/**
 * Ascending, duplicate-free list of primes, extended on demand.
 * Invariant: entry 0 is always 2n.
 */
export class PrimeCache {
  private readonly known: bigint[] = [2n];

  /** Number of primes discovered so far. */
  get size(): number {
    return this.known.length;
  }

  /**
   * Get the prime at `index`, extending the cache as far as needed.
   *
   * @throws RangeError if index is negative or not an integer
   */
  at(index: number): bigint {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`PrimeCache: invalid index ${index}`);
    }
    while (this.known.length <= index) {
      this.known.push(this.nextPrime());
    }
    return this.known[index];
  }

  /** Extend the cache until it holds at least `count` primes. */
  preload(count: number): void {
    if (count > 0) {
      this.at(count - 1);
    }
  }

  /** Copy of the primes discovered so far. */
  snapshot(): readonly bigint[] {
    return [...this.known];
  }

  private nextPrime(): bigint {
    let candidate = this.known[this.known.length - 1] + 1n;
    while (!this.isPrime(candidate)) {
      candidate++;
    }
    return candidate;
  }

  private isPrime(candidate: bigint): boolean {
    for (const p of this.known) {
      if (p * p > candidate) return true;
      if (candidate % p === 0n) return false;
    }
    return true;
  }
}

let shared: PrimeCache | undefined;

/**
 * The process-wide prime cache, created on first use.
 */
export function sharedPrimeCache(): PrimeCache {
  if (!shared) {
    shared = new PrimeCache();
  }
  return shared;
}

/**
 * Infinite ascending prime sequence, starting from 2 on every call.
 * Stopping early is fine; only the primes actually requested get computed.
 */
export function* primes(cache: PrimeCache = sharedPrimeCache()): Generator<bigint, never, undefined> {
  for (let index = 0; ; index++) {
    yield cache.at(index);
  }
}
