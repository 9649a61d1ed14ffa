const MODULUS = 0x7FFFFFFF;   // 2^31 - 1
const MULTIPLIER = 16807;

/**
 * Park-Miller minimal standard generator, used to build reproducible test
 * buffers: the same seed always yields the same bytes, so a failing
 * `runpack test --seed N` run can be replayed exactly.
 */
export class SeededRNG {
    private state: number;

    constructor(seed: number) {
        const reduced = Math.trunc(seed) % MODULUS;
        // Zero is a fixed point of the recurrence; fold it and negatives into 1..MODULUS-1.
        this.state = reduced > 0 ? reduced : reduced + MODULUS - 1;
    }

    /** Advances the state; returns an integer in 1..2^31-2. */
    private step(): number {
        this.state = (this.state * MULTIPLIER) % MODULUS;
        return this.state;
    }

    /** Uniform in [0, 1). */
    next(): number {
        return (this.step() - 1) / (MODULUS - 1);
    }

    /** Integer in [min, max). */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }

    nextByte(): number {
        return this.nextInt(0, 256);
    }

    /** Fills `out` (or `out[start..end)`) with random bytes and returns it. */
    fillBytes(out: Uint8Array, start = 0, end = out.length): Uint8Array {
        for (let i = start; i < end; i++) out[i] = this.nextByte();
        return out;
    }
}
