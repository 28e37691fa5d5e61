/**
 * @fileoverview Random source helpers.
 * @module utils/prng
 * @version 1.0.0
 */

/** A source of uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;

// ============================================
// Mulberry32 PRNG
// ============================================

/**
 * Create a Mulberry32 PRNG function.
 * Mulberry32 is a fast, high-quality 32-bit PRNG; used to make random picks
 * reproducible in tests.
 *
 * @param seed - Initial seed value
 * @returns A function that returns the next random number [0, 1)
 * @see https://github.com/bryc/code/blob/master/jshash/PRNGs.md
 */
export function createMulberry32(seed: number): RandomSource {
    if (!Number.isFinite(seed)) {
        throw new Error('Seed must be a finite number');
    }
    let state = seed;
    return function (): number {
        let t = (state += 0x6d2b79f5);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

// ============================================
// Uniform pick
// ============================================

/**
 * Pick one element uniformly at random.
 *
 * @param items - Candidates (not mutated)
 * @param random - Random source, `Math.random` by default
 * @returns The picked element, or null for an empty list
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T | null {
    if (items.length === 0) {
        return null;
    }
    // Clamp guards sources that return exactly 1.
    const index = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[index] ?? null;
}
