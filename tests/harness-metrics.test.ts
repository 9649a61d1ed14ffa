import { measure, summarize } from '../src/runpack/metrics.js';
import { SeededRNG } from '../src/harness/rng.js';
import { generateMixedData, generateRandomData } from '../src/harness/generate.js';
import { formatLogEntry, formatLog, formatSummary, type RoundTripReport } from '../src/harness/report.js';

const REPORT: RoundTripReport = {
    label: 'x.bin',
    originalBytes: 1000,
    compressedBytes: 250,
    ratio: 0.25,
    compressMs: 1.5,
    decompressMs: 0.25,
    compressBytesPerSecond: 666666.6667,
    decompressBytesPerSecond: 4_000_000,
};

describe('metrics', () => {
    it('summarizes ratio and throughput', () => {
        expect(summarize({ inputBytes: 1000, outputBytes: 250, elapsedMs: 500 })).toEqual({
            ratio: 0.25,
            bytesPerSecond: 2000,
        });
    });

    it('reports zeros instead of dividing by zero', () => {
        expect(summarize({ inputBytes: 0, outputBytes: 4, elapsedMs: 0 })).toEqual({ ratio: 0, bytesPerSecond: 0 });
    });

    it('returns the measured result with a non-negative duration', () => {
        const timed = measure(() => 41 + 1);
        expect(timed.result).toBe(42);
        expect(timed.elapsedMs).toBeGreaterThanOrEqual(0);
    });
});

describe('synthetic data', () => {
    it('follows the Park-Miller sequence', () => {
        const rng = new SeededRNG(1);
        expect(rng.next()).toBeCloseTo(16806 / 2147483646, 12);
    });

    it('keeps nextInt within [min, max)', () => {
        const rng = new SeededRNG(5);
        for (let i = 0; i < 1000; i++) {
            const n = rng.nextInt(3, 7);
            expect(n).toBeGreaterThanOrEqual(3);
            expect(n).toBeLessThan(7);
        }
    });

    it('fills only the requested byte range', () => {
        const out = new SeededRNG(9).fillBytes(new Uint8Array(8).fill(0xAB), 2, 6);
        expect(Array.from(out.subarray(0, 2))).toEqual([0xAB, 0xAB]);
        expect(Array.from(out.subarray(6))).toEqual([0xAB, 0xAB]);
        expect(Array.from(out.subarray(2, 6))).toEqual(Array.from(generateRandomData(4, 9)));
    });

    it('is reproducible from the seed', () => {
        expect(generateMixedData({ seed: 11, segments: 20 })).toEqual(generateMixedData({ seed: 11, segments: 20 }));
        expect(generateRandomData(64, 3)).toEqual(generateRandomData(64, 3));
    });

    it('sizes each segment between 2 and 148 bytes', () => {
        const data = generateMixedData({ seed: 8, segments: 10 });
        expect(data.length).toBeGreaterThanOrEqual(20);
        expect(data.length).toBeLessThanOrEqual(1480);
    });
});

describe('report formatting', () => {
    it('formats a folder log entry', () => {
        expect(formatLogEntry(REPORT, 42)).toBe([
            'Timestamp: 42s',
            'File: x.bin',
            'Original Size: 1000 bytes',
            'Compressed Size: 250 bytes',
            'Ratio: 0.25',
            'Compress Time: 1.500ms',
            'Compress Speed: 666666.67 bytes/s',
            'Decompress Time: 0.250ms',
            'Decompress Speed: 4000000.00 bytes/s',
            '---',
        ].join('\n'));
    });

    it('adds the baseline ratio when present', () => {
        const entry = formatLogEntry({ ...REPORT, baselineBytes: 100, baselineRatio: 0.1 }, 42);
        expect(entry.endsWith('Baseline Ratio (zstd): 0.10\n---')).toBe(true);
    });

    it('separates entries with a blank line', () => {
        expect(formatLog(['a\n---', 'b\n---'])).toBe('a\n---\n\nb\n---');
    });

    it('formats a console summary', () => {
        expect(formatSummary(REPORT)).toEqual([
            'Original size: 1000 bytes',
            'Compressed size: 250 bytes (ratio: 0.25)',
            'Compression time: 1.500ms',
            'Decompressed size: 1000 bytes',
            'Decompression time: 0.250ms',
        ]);
    });
});
