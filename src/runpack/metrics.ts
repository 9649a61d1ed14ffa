import { performance } from 'node:perf_hooks';

export interface Timed<T> {
    result: T;
    elapsedMs: number;
}

export interface SizeSample {
    inputBytes: number;
    outputBytes: number;
    elapsedMs: number;
}

export interface SizeSummary {
    /** outputBytes / inputBytes; 0 for empty input. */
    ratio: number;
    /** Input bytes processed per second; 0 when no time was measured. */
    bytesPerSecond: number;
}

export function measure<T>(fn: () => T): Timed<T> {
    const start = performance.now();
    const result = fn();
    return { result, elapsedMs: performance.now() - start };
}

export async function measureAsync<T>(fn: () => Promise<T>): Promise<Timed<T>> {
    const start = performance.now();
    const result = await fn();
    return { result, elapsedMs: performance.now() - start };
}

export function summarize(sample: SizeSample): SizeSummary {
    const ratio = sample.inputBytes > 0 ? sample.outputBytes / sample.inputBytes : 0;
    const bytesPerSecond = sample.elapsedMs > 0 ? sample.inputBytes / (sample.elapsedMs / 1000) : 0;
    return { ratio, bytesPerSecond };
}
