import {
    BLOCK_LENGTH_SIZE, DEFAULT_MAX_OUTPUT_BYTES, MIN_RUN, MAX_BLOCK_SIZE, isFlagByte
} from './format.js';
import { MalformedInputError, TruncatedBufferError, LimitExceededError } from './errors.js';
import { FrameReader } from './frame-reader.js';
import { readToken, tokenSpan, type Token } from './tokens.js';
import type { BlockInfo, DecodeMode, InspectOptions, StreamInfo } from './types.js';

/**
 * Rejects single tokens the encoder never emits. Token sequences are not
 * compared against a re-encode, so e.g. three equal literals still pass.
 */
function assertCanonical(token: Token, offset: number, blockIndex: number): void {
    if (token.kind === 'run' && token.length < MIN_RUN) {
        throw new MalformedInputError(
            `Run token at offset ${offset} has length ${token.length} (minimum ${MIN_RUN})`,
            { offset, blockIndex },
        );
    }
    if (token.kind === 'escaped' && !isFlagByte(token.value)) {
        throw new MalformedInputError(
            `Escaped literal at offset ${offset} carries non-flag value ${token.value}`,
            { offset, blockIndex },
        );
    }
}

function scanBlock(
    data: Uint8Array,
    reader: FrameReader,
    index: number,
    mode: DecodeMode,
): BlockInfo {
    const offset = reader.offset;
    const payloadBytes = reader.getUint32('block length', index);
    if (payloadBytes > reader.remaining) {
        throw new TruncatedBufferError(
            `Block ${index} declares ${payloadBytes} payload bytes but only ${reader.remaining} remain`,
            { offset, blockIndex: index },
        );
    }
    if (mode === 'strict' && payloadBytes === 0) {
        throw new MalformedInputError(`Block ${index} has an empty payload`, { offset, blockIndex: index });
    }

    const tokens = { literal: 0, escaped: 0, run: 0 };
    let decodedBytes = 0;
    let pos = offset + BLOCK_LENGTH_SIZE;
    const end = pos + payloadBytes;
    while (pos < end) {
        const { token, next } = readToken(data, pos, end, index);
        if (mode === 'strict') assertCanonical(token, pos, index);
        tokens[token.kind]++;
        decodedBytes += tokenSpan(token);
        pos = next;
    }

    if (mode === 'strict' && decodedBytes > MAX_BLOCK_SIZE) {
        throw new MalformedInputError(
            `Block ${index} decodes to ${decodedBytes} bytes (maximum ${MAX_BLOCK_SIZE})`,
            { offset, blockIndex: index },
        );
    }

    reader.skip(payloadBytes, index);
    return { index, offset, payloadBytes, decodedBytes, tokens };
}

/**
 * Walks the framing and every token of a compressed buffer without
 * producing output. Raises the same errors decompress() would.
 */
export function inspect(data: Uint8Array, options: InspectOptions = {}): StreamInfo {
    const mode = options.mode ?? 'lenient';
    const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const reader = new FrameReader(data);

    const blockCount = reader.getUint32('block count');
    // Each block needs at least its length prefix.
    if (blockCount * BLOCK_LENGTH_SIZE > reader.remaining) {
        throw new TruncatedBufferError(
            `Block count ${blockCount} exceeds what ${reader.remaining} remaining bytes can hold`,
            { offset: 0 },
        );
    }

    const blocks: BlockInfo[] = [];
    let decodedBytes = 0;
    for (let i = 0; i < blockCount; i++) {
        const block = scanBlock(data, reader, i, mode);
        decodedBytes += block.decodedBytes;
        if (decodedBytes > maxOutputBytes) {
            throw new LimitExceededError(
                `Decoded size limit exceeded at block ${i} (${decodedBytes} > ${maxOutputBytes})`,
            );
        }
        blocks.push(block);
    }

    const trailingBytes = reader.remaining;
    if (mode === 'strict' && trailingBytes > 0) {
        throw new MalformedInputError(
            `${trailingBytes} trailing byte(s) after the last block`,
            { offset: reader.offset },
        );
    }

    return {
        blockCount,
        compressedBytes: data.length,
        decodedBytes,
        trailingBytes,
        blocks,
    };
}
