import { compress } from '../runpack/encode.js';
import { decompress } from '../runpack/decode.js';
import { RoundTripMismatchError } from '../runpack/errors.js';
import { measure, measureAsync, summarize } from '../runpack/metrics.js';
import type { RunPackDecoderOptions, RunPackEncoderOptions, RunPackLogger } from '../runpack/types.js';
import { FileAccess } from '../io/file-access.js';
import { ZstdBaseline, type BaselineCompressor } from './baseline.js';
import type { RoundTripReport } from './report.js';

export type RoundTripOptions = {
    label?: string;
    encoder?: RunPackEncoderOptions;
    decoder?: RunPackDecoderOptions;
    /** Also compress with zstd and report its ratio. */
    baseline?: boolean;
    /** Override the baseline compressor (zstd by default). */
    baselineCompressor?: BaselineCompressor;
    logger?: RunPackLogger | null;
};

/** Index of the first differing byte, or -1 when the buffers are identical. */
export function findFirstMismatch(expected: Uint8Array, actual: Uint8Array): number {
    const shared = Math.min(expected.length, actual.length);
    for (let i = 0; i < shared; i++) {
        if (expected[i] !== actual[i]) return i;
    }
    return expected.length === actual.length ? -1 : shared;
}

/**
 * Compresses then decompresses `data`, verifies the result byte for byte and
 * returns sizes and timings. Throws RoundTripMismatchError on any difference.
 */
export async function roundTrip(data: Uint8Array, options: RoundTripOptions = {}): Promise<RoundTripReport> {
    const label = options.label ?? 'buffer';
    const logger = options.logger ?? null;

    const encoded = measure(() => compress(data, { logger, ...options.encoder }));
    const decoded = measure(() => decompress(encoded.result, { logger, ...options.decoder }));

    const mismatch = findFirstMismatch(data, decoded.result);
    if (mismatch !== -1) {
        throw new RoundTripMismatchError(
            `Decompression mismatch for ${label} at offset ${mismatch}`,
            mismatch,
            data.length,
            decoded.result.length,
        );
    }

    const compressSummary = summarize({
        inputBytes: data.length,
        outputBytes: encoded.result.length,
        elapsedMs: encoded.elapsedMs,
    });
    const decompressSummary = summarize({
        inputBytes: data.length,
        outputBytes: data.length,
        elapsedMs: decoded.elapsedMs,
    });

    const report: RoundTripReport = {
        label,
        originalBytes: data.length,
        compressedBytes: encoded.result.length,
        ratio: compressSummary.ratio,
        compressMs: encoded.elapsedMs,
        decompressMs: decoded.elapsedMs,
        compressBytesPerSecond: compressSummary.bytesPerSecond,
        decompressBytesPerSecond: decompressSummary.bytesPerSecond,
    };

    if (options.baseline) {
        const compressor = options.baselineCompressor ?? ZstdBaseline;
        const baseline = await measureAsync(() => compressor.compress(data));
        report.baselineBytes = baseline.result.length;
        report.baselineRatio = summarize({
            inputBytes: data.length,
            outputBytes: baseline.result.length,
            elapsedMs: baseline.elapsedMs,
        }).ratio;
    }

    logger?.info?.(`${label}: ${data.length} -> ${report.compressedBytes} bytes (ratio ${report.ratio.toFixed(2)})`);
    return report;
}

export async function testFile(target: string, options: RoundTripOptions = {}): Promise<RoundTripReport> {
    const data = await FileAccess.readBytes(target);
    options.logger?.info?.(`Loaded ${target} (${data.length} bytes)`);
    return roundTrip(data, { label: target, ...options });
}
