/**
 * Seedable pseudo-random source.
 *
 * Anything that needs randomness takes a `Random` instead of calling
 * Math.random, so a population can be rebuilt exactly from its seed.
 */

/** Returns a float in [0, 1) */
export type Random = () => number

/**
 * Mulberry32: 32-bit state, full period of 2^32.
 */
export function mulberry32(seed: number): Random {
    let state = seed >>> 0
    return () => {
        state = (state + 0x6d2b79f5) >>> 0
        let t = state
        t = Math.imul(t ^ (t >>> 15), t | 1)
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

/** Uniform float in [min, max) */
export function randomRange(rng: Random, min: number, max: number): number {
    return min + (max - min) * rng()
}
