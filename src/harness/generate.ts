import { SeededRNG } from './rng.js';

export interface MixedDataOptions {
    /** Defaults to the current time, so each run differs unless pinned. */
    seed?: number;
    /** Number of run-then-noise segments. Default 1024. */
    segments?: number;
}

const MAX_RUN_LENGTH = 100;   // exclusive
const MAX_NOISE_LENGTH = 50;  // exclusive

/**
 * Builds a buffer that alternates runs of one random byte (1-99 long) with
 * stretches of random noise (1-49 bytes), roughly 1 MiB at the default size.
 */
export function generateMixedData(options: MixedDataOptions = {}): Uint8Array {
    const rng = new SeededRNG(options.seed ?? Date.now());
    const segments = options.segments ?? 1024;
    const out: number[] = [];

    for (let s = 0; s < segments; s++) {
        const value = rng.nextByte();
        const runLength = rng.nextInt(1, MAX_RUN_LENGTH);
        for (let i = 0; i < runLength; i++) out.push(value);

        const noiseLength = rng.nextInt(1, MAX_NOISE_LENGTH);
        for (let i = 0; i < noiseLength; i++) out.push(rng.nextByte());
    }
    return Uint8Array.from(out);
}

/** Uniform random bytes; effectively incompressible for run-length coding. */
export function generateRandomData(length: number, seed: number): Uint8Array {
    return new SeededRNG(seed).fillBytes(new Uint8Array(length));
}
