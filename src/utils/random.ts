/**
 * Explicit source of randomness threaded through the search.
 *
 * Every random draw the engine makes (rollout moves, random expansion order,
 * stochastic transitions) goes through one of these, so a fixed seed
 * reproduces a search exactly.
 */
export interface RandomSource {
    /** Uniform float in [0, 1) */
    next(): number;

    /** Uniform integer in [0, maxExclusive) */
    nextInt(maxExclusive: number): number;
}

function toInt(next: () => number, maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
        throw new Error(`nextInt requires a positive integer bound, got ${maxExclusive}`);
    }
    return Math.floor(next() * maxExclusive);
}

// FNV-1a, 32-bit
function hashString(str: string): number {
    let h = 0x811c9dc5;
    for (let i = 0; i < str.length; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, 0x01000193);
    }
    return h >>> 0;
}

/**
 * Creates a deterministic 32-bit generator (mulberry32).
 * String seeds are hashed, numeric seeds are truncated to an unsigned 32-bit integer.
 */
export function createSeededRandom(seed: number | string = 0): RandomSource {
    let state = typeof seed === 'string' ? hashString(seed) : seed >>> 0;

    const next = (): number => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };

    return {
        next,
        nextInt: (maxExclusive: number) => toInt(next, maxExclusive),
    };
}

/**
 * Non-reproducible source backed by Math.random.
 */
export const mathRandom: RandomSource = {
    next: () => Math.random(),
    nextInt: (maxExclusive: number) => toInt(() => Math.random(), maxExclusive),
};
