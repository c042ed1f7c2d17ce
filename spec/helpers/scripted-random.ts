import type { RandomSource } from '../../src/utils/random.js';

/**
 * Replays a fixed list of values, cycling when exhausted.
 */
export class ScriptedRandom implements RandomSource {
    private index = 0;

    constructor(private readonly values: readonly number[]) {}

    next(): number {
        const value = this.values[this.index % this.values.length];
        this.index++;
        return value;
    }

    nextInt(maxExclusive: number): number {
        return Math.floor(this.next() * maxExclusive);
    }

    /** Number of values drawn so far */
    get draws(): number {
        return this.index;
    }
}
