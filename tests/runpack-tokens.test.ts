import { nextToken, readToken, tokenSize, tokenSpan, tokenize, writeToken, type Token } from '../src/runpack/tokens.js';
import { TruncatedBufferError } from '../src/runpack/errors.js';

describe('runpack tokens', () => {
    it('stops a run scan at the given end', () => {
        const block = new Uint8Array([5, 5, 5, 5]);
        expect(nextToken(block, 0, 2)).toEqual({ kind: 'literal', value: 5 });
        expect(nextToken(block, 0, 3)).toEqual({ kind: 'run', value: 5, length: 3 });
        expect(nextToken(block, 1)).toEqual({ kind: 'run', value: 5, length: 3 });
    });

    it('marks flag values as escaped when they do not form a run', () => {
        expect(nextToken(new Uint8Array([255, 0]), 0)).toEqual({ kind: 'escaped', value: 255 });
    });

    it('sizes tokens in encoded and raw bytes', () => {
        const run: Token = { kind: 'run', value: 1, length: 200 };
        const escaped: Token = { kind: 'escaped', value: 254 };
        const literal: Token = { kind: 'literal', value: 3 };
        expect([tokenSize(run), tokenSize(escaped), tokenSize(literal)]).toEqual([3, 2, 1]);
        expect([tokenSpan(run), tokenSpan(escaped), tokenSpan(literal)]).toEqual([200, 1, 1]);
    });

    it('writes tokens and reads them back', () => {
        const tokens: Token[] = [
            { kind: 'literal', value: 3 },
            { kind: 'run', value: 254, length: 17 },
            { kind: 'escaped', value: 255 },
        ];
        const out = new Uint8Array(6);
        let pos = 0;
        for (const token of tokens) pos = writeToken(out, pos, token);
        expect(pos).toBe(6);
        expect(Array.from(out)).toEqual([3, 254, 17, 254, 255, 255]);

        const read: Token[] = [];
        let at = 0;
        while (at < out.length) {
            const { token, next } = readToken(out, at, out.length);
            read.push(token);
            at = next;
        }
        expect(read).toEqual(tokens);
    });

    it('raises TruncatedBufferError with the block index', () => {
        const data = new Uint8Array([254, 4]);
        expect(() => readToken(data, 0, 2, 3)).toThrow(TruncatedBufferError);
        expect(() => readToken(data, 0, 2, 3)).toThrow(expect.objectContaining({ offset: 0, blockIndex: 3 }));
        expect(() => readToken(data, 2, 2)).toThrow('Unexpected end of block (token at offset 2)');
    });

    it('tokenizes an empty block to nothing', () => {
        expect(tokenize(new Uint8Array(0))).toEqual([]);
    });
});
