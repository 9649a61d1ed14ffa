import { BLOCK_LENGTH_SIZE, DEFAULT_MAX_OUTPUT_BYTES } from './format.js';
import { InvalidOptionError } from './errors.js';
import { inspect } from './inspect.js';
import { readToken } from './tokens.js';
import type { RunPackDecoderOptions } from './types.js';

function resolveDecoderOptions(options: RunPackDecoderOptions): Required<RunPackDecoderOptions> {
    const resolved: Required<RunPackDecoderOptions> = {
        mode: options.mode ?? 'lenient',
        maxOutputBytes: options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES,
        logger: options.logger ?? null,
    };
    if (resolved.mode !== 'lenient' && resolved.mode !== 'strict') {
        throw new InvalidOptionError(`mode must be 'lenient' or 'strict', got ${String(resolved.mode)}`);
    }
    if (!Number.isSafeInteger(resolved.maxOutputBytes) || resolved.maxOutputBytes < 0) {
        throw new InvalidOptionError(`maxOutputBytes must be a non-negative integer, got ${resolved.maxOutputBytes}`);
    }
    return resolved;
}

/**
 * Reconstructs the original bytes from a compressed buffer.
 *
 * The stream is validated in full before anything is written, so the
 * output is allocated once at its exact size and no read goes out of bounds.
 */
export function decompress(data: Uint8Array, options: RunPackDecoderOptions = {}): Uint8Array {
    const { mode, maxOutputBytes, logger } = resolveDecoderOptions(options);
    const info = inspect(data, { mode, maxOutputBytes });

    if (info.trailingBytes > 0) {
        logger?.warn?.(`runpack: ignoring ${info.trailingBytes} trailing byte(s) after block ${info.blockCount}`);
    }

    const out = new Uint8Array(info.decodedBytes);
    let written = 0;
    for (const block of info.blocks) {
        let pos = block.offset + BLOCK_LENGTH_SIZE;
        const end = pos + block.payloadBytes;
        while (pos < end) {
            const { token, next } = readToken(data, pos, end, block.index);
            if (token.kind === 'run') {
                out.fill(token.value, written, written + token.length);
                written += token.length;
            } else {
                out[written++] = token.value;
            }
            pos = next;
        }
    }

    logger?.info?.(`runpack: decoded ${info.blockCount} block(s), ${data.length} bytes into ${written} bytes`);
    return out;
}
