import * as fs from 'fs';
import * as path from 'path';
import { roundTrip, testFile, findFirstMismatch } from '../src/harness/roundtrip.js';
import type { BaselineCompressor } from '../src/harness/baseline.js';
import { compress } from '../src/runpack/encode.js';
import { FileAccessError } from '../src/runpack/errors.js';
import { makeSandboxDir, repeat } from './helpers/test-utils.js';

describe('round-trip harness', () => {
    describe('findFirstMismatch', () => {
        it('returns -1 for identical buffers', () => {
            expect(findFirstMismatch(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(-1);
        });

        it('returns the first differing offset', () => {
            expect(findFirstMismatch(new Uint8Array([1, 2, 3]), new Uint8Array([1, 9, 3]))).toBe(1);
        });

        it('treats a length difference as a mismatch at the shorter length', () => {
            expect(findFirstMismatch(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(2);
            expect(findFirstMismatch(new Uint8Array(0), new Uint8Array([0]))).toBe(0);
        });
    });

    it('reports sizes and ratio for a verified round trip', async () => {
        const data = repeat(4, 600);
        const report = await roundTrip(data, { label: 'fours' });

        expect(report.label).toBe('fours');
        expect(report.originalBytes).toBe(600);
        expect(report.compressedBytes).toBe(compress(data).length);
        expect(report.compressedBytes).toBe(17);
        expect(report.ratio).toBeCloseTo(17 / 600, 10);
        expect(report.compressMs).toBeGreaterThanOrEqual(0);
        expect(report.baselineBytes).toBeUndefined();
    });

    it('passes encoder options through', async () => {
        const report = await roundTrip(repeat(4, 600), { encoder: { blockSize: 100 } });
        // six blocks of one 100-byte run each
        expect(report.compressedBytes).toBe(4 + 6 * (4 + 3));
    });

    it('accepts codec options left undefined', async () => {
        const report = await roundTrip(repeat(4, 600), {
            encoder: { blockSize: undefined },
            decoder: { mode: undefined, maxOutputBytes: undefined },
        });
        // one block: 255 + 255 + 90
        expect(report.compressedBytes).toBe(4 + 4 + 3 * 3);
    });

    it('adds a baseline figure from the supplied compressor', async () => {
        const fake: BaselineCompressor = {
            name: 'fake',
            compress: async (d) => d.subarray(0, 10),
            decompress: async (d) => d,
        };
        const report = await roundTrip(new Uint8Array(100), { baseline: true, baselineCompressor: fake });
        expect(report.baselineBytes).toBe(10);
        expect(report.baselineRatio).toBeCloseTo(0.1, 10);
    });

    it('logs through the supplied logger', async () => {
        const info = vi.fn();
        await roundTrip(new Uint8Array([1, 2, 3]), { label: 'tiny', logger: { info } });
        expect(info).toHaveBeenCalledWith('tiny: 3 -> 11 bytes (ratio 3.67)');
    });

    it('round-trips a file from disk', async () => {
        const dir = makeSandboxDir('harness');
        const target = path.join(dir, 'input.bin');
        fs.writeFileSync(target, Buffer.from([9, 9, 9, 9, 255]));

        const report = await testFile(target);
        expect(report.label).toBe(target);
        expect(report.originalBytes).toBe(5);
        expect(report.compressedBytes).toBe(4 + 4 + 3 + 2);
    });

    it('surfaces a missing file as FileAccessError', async () => {
        await expect(testFile(path.join(makeSandboxDir('harness'), 'nope.bin'))).rejects.toBeInstanceOf(FileAccessError);
    });
});
