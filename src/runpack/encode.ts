import {
    DEFAULT_BLOCK_SIZE, MAX_BLOCK_SIZE, BLOCK_COUNT_SIZE, BLOCK_LENGTH_SIZE,
    ESCAPED_TOKEN_SIZE, blockCountFor
} from './format.js';
import { InvalidOptionError } from './errors.js';
import { nextToken, tokenSpan, writeToken } from './tokens.js';
import type { RunPackEncoderOptions } from './types.js';

function resolveEncoderOptions(options: RunPackEncoderOptions): Required<RunPackEncoderOptions> {
    // Fields left undefined fall back to their defaults.
    const resolved: Required<RunPackEncoderOptions> = {
        blockSize: options.blockSize ?? DEFAULT_BLOCK_SIZE,
        logger: options.logger ?? null,
    };
    const { blockSize } = resolved;
    if (!Number.isInteger(blockSize) || blockSize < 1 || blockSize > MAX_BLOCK_SIZE) {
        throw new InvalidOptionError(`blockSize must be an integer in 1..${MAX_BLOCK_SIZE}, got ${blockSize}`);
    }
    return resolved;
}

/**
 * Run-length encodes one block. Runs of 3+ become run tokens, everything
 * else is a literal, escaped when it collides with a flag value.
 */
export function encodeBlock(block: Uint8Array): Uint8Array {
    // Worst case: every byte is a lone 0xFE/0xFF and costs an escape.
    const out = new Uint8Array(block.length * ESCAPED_TOKEN_SIZE);
    let written = 0;
    let pos = 0;
    while (pos < block.length) {
        const token = nextToken(block, pos);
        written = writeToken(out, written, token);
        pos += tokenSpan(token);
    }
    return out.subarray(0, written);
}

/**
 * Compresses `data` into the framed block format. Never fails for any input;
 * empty input yields a zero block count and nothing else.
 */
export function compress(data: Uint8Array, options: RunPackEncoderOptions = {}): Uint8Array {
    const { blockSize, logger } = resolveEncoderOptions(options);
    const blockCount = blockCountFor(data.length, blockSize);

    const payloads: Uint8Array[] = [];
    let totalSize = BLOCK_COUNT_SIZE;
    for (let start = 0; start < data.length; start += blockSize) {
        const payload = encodeBlock(data.subarray(start, start + blockSize));
        payloads.push(payload);
        totalSize += BLOCK_LENGTH_SIZE + payload.length;
    }

    const out = new Uint8Array(totalSize);
    const view = new DataView(out.buffer);
    let pos = 0;
    view.setUint32(pos, blockCount, false); pos += BLOCK_COUNT_SIZE;
    for (const payload of payloads) {
        view.setUint32(pos, payload.length, false); pos += BLOCK_LENGTH_SIZE;
        out.set(payload, pos); pos += payload.length;
    }

    logger?.info?.(`runpack: encoded ${data.length} bytes into ${blockCount} block(s), ${out.length} bytes`);
    return out;
}
