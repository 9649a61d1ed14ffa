import {
    MIN_RUN, MAX_RUN, RUN_FLAG, ESCAPE_FLAG, isFlagByte,
    RUN_TOKEN_SIZE, ESCAPED_TOKEN_SIZE, LITERAL_TOKEN_SIZE
} from './format.js';
import { TruncatedBufferError } from './errors.js';

export interface LiteralToken {
    kind: 'literal';
    value: number;
}

export interface EscapedToken {
    kind: 'escaped';
    value: number;
}

export interface RunToken {
    kind: 'run';
    value: number;
    length: number;
}

export type Token = LiteralToken | EscapedToken | RunToken;
export type TokenKind = Token['kind'];

export interface ReadTokenResult {
    token: Token;
    /** Offset of the first byte after the token. */
    next: number;
}

/**
 * Chooses the token the encoder emits for the bytes starting at `pos`.
 * The run scan stops at `end` and at MAX_RUN, whichever comes first.
 */
export function nextToken(block: Uint8Array, pos: number, end: number = block.length): Token {
    const value = block[pos];
    let length = 1;
    while (pos + length < end && block[pos + length] === value && length < MAX_RUN) {
        length++;
    }
    if (length >= MIN_RUN) {
        return { kind: 'run', value, length };
    }
    return isFlagByte(value) ? { kind: 'escaped', value } : { kind: 'literal', value };
}

/** Number of raw bytes a token stands for. */
export function tokenSpan(token: Token): number {
    return token.kind === 'run' ? token.length : 1;
}

/** Number of encoded bytes a token occupies. */
export function tokenSize(token: Token): number {
    switch (token.kind) {
        case 'run': return RUN_TOKEN_SIZE;
        case 'escaped': return ESCAPED_TOKEN_SIZE;
        case 'literal': return LITERAL_TOKEN_SIZE;
    }
}

/** Writes the encoded form of `token` at `pos` and returns the next write offset. */
export function writeToken(out: Uint8Array, pos: number, token: Token): number {
    switch (token.kind) {
        case 'run':
            out[pos] = RUN_FLAG;
            out[pos + 1] = token.length;
            out[pos + 2] = token.value;
            return pos + RUN_TOKEN_SIZE;
        case 'escaped':
            out[pos] = ESCAPE_FLAG;
            out[pos + 1] = token.value;
            return pos + ESCAPED_TOKEN_SIZE;
        case 'literal':
            out[pos] = token.value;
            return pos + LITERAL_TOKEN_SIZE;
    }
}

/**
 * Reads one encoded token from `data[pos..end)`.
 *
 * A flag byte always consumes its operands, so a token cut off by `end`
 * raises TruncatedBufferError instead of reading past the block.
 */
export function readToken(data: Uint8Array, pos: number, end: number, blockIndex?: number): ReadTokenResult {
    if (pos >= end) {
        throw new TruncatedBufferError(`Unexpected end of block (token at offset ${pos})`, { offset: pos, blockIndex });
    }
    const flag = data[pos];

    if (flag === ESCAPE_FLAG) {
        if (pos + ESCAPED_TOKEN_SIZE > end) {
            throw new TruncatedBufferError(
                `Escaped literal at offset ${pos} is missing its value byte`,
                { offset: pos, blockIndex },
            );
        }
        return { token: { kind: 'escaped', value: data[pos + 1] }, next: pos + ESCAPED_TOKEN_SIZE };
    }

    if (flag === RUN_FLAG) {
        if (pos + RUN_TOKEN_SIZE > end) {
            throw new TruncatedBufferError(
                `Run token at offset ${pos} is missing its length or value byte`,
                { offset: pos, blockIndex },
            );
        }
        return {
            token: { kind: 'run', length: data[pos + 1], value: data[pos + 2] },
            next: pos + RUN_TOKEN_SIZE,
        };
    }

    return { token: { kind: 'literal', value: flag }, next: pos + LITERAL_TOKEN_SIZE };
}

/** Splits a raw block into the token sequence the encoder emits for it. */
export function tokenize(block: Uint8Array): Token[] {
    const tokens: Token[] = [];
    let pos = 0;
    while (pos < block.length) {
        const token = nextToken(block, pos);
        tokens.push(token);
        pos += tokenSpan(token);
    }
    return tokens;
}
