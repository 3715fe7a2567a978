/**
 * Seeded random source
 *
 * Every strategy draws randomness from an Rng passed in by the caller, so a
 * fixed seed reproduces a decision exactly.
 */

export interface Rng {
  /** Float in [0, 1) */
  next(): number
  /** Integer in [0, maxExclusive) */
  int(maxExclusive: number): number
  /** Index drawn with probability proportional to its weight */
  weightedIndex(weights: readonly number[]): number
}

// Simple string -> uint32 hash (xfnv1a)
function hashStrToUint(str: string): number {
  let h = 2166136261 >>> 0
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i)
    h = Math.imul(h, 16777619) >>> 0
  }
  return h >>> 0
}

// Mulberry32: small, fast, deterministic. Accepts a uint32 seed.
function mulberry32(seed: number): () => number {
  let a = seed
  return () => {
    let t = (a += 0x6d2b79f5) >>> 0
    t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0
    t ^= (t + Math.imul(t ^ (t >>> 7), t | 61)) >>> 0
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Creates a deterministic random source.
 *
 * @param seed - Number or string seed (default: current time)
 */
export function createRng(seed: string | number = Date.now()): Rng {
  const seedNum = typeof seed === 'number' ? seed >>> 0 : hashStrToUint(seed)
  const next = mulberry32(seedNum || 1)

  return {
    next,
    int(maxExclusive: number): number {
      if (maxExclusive <= 0) {
        throw new RangeError(`int() needs a positive bound, got ${maxExclusive}`)
      }
      return Math.floor(next() * maxExclusive) % maxExclusive
    },
    weightedIndex(weights: readonly number[]): number {
      if (weights.length === 0) {
        throw new RangeError('weightedIndex() needs at least one weight')
      }
      const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0)
      if (total <= 0) {
        return Math.floor(next() * weights.length) % weights.length
      }
      let remaining = next() * total
      for (let i = 0; i < weights.length; i++) {
        remaining -= Math.max(0, weights[i])
        if (remaining < 0) return i
      }
      return weights.length - 1
    },
  }
}
