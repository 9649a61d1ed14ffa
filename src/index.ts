/**
 * runpack Public API
 *
 * @module runpack
 */

import { compress } from './runpack/encode.js';
import { decompress } from './runpack/decode.js';
import { inspect } from './runpack/inspect.js';
import { MalformedInputError } from './runpack/errors.js';
import type { DecodeMode } from './runpack/types.js';

export { compress, encodeBlock } from './runpack/encode.js';
export { decompress } from './runpack/decode.js';
export { inspect } from './runpack/inspect.js';
export { nextToken, readToken, tokenize, tokenSpan, tokenSize, writeToken } from './runpack/tokens.js';
export type { Token, TokenKind, LiteralToken, EscapedToken, RunToken, ReadTokenResult } from './runpack/tokens.js';
export {
    MAX_BLOCK_SIZE, DEFAULT_BLOCK_SIZE, MIN_RUN, MAX_RUN, RUN_FLAG, ESCAPE_FLAG,
    BLOCK_COUNT_SIZE, BLOCK_LENGTH_SIZE, blockCountFor
} from './runpack/format.js';
export {
    RunPackError, MalformedInputError, TruncatedBufferError, LimitExceededError,
    InvalidOptionError, RoundTripMismatchError, FileAccessError
} from './runpack/errors.js';
export type {
    RunPackEncoderOptions as EncoderOptions,
    RunPackDecoderOptions as DecoderOptions,
    RunPackLogger as Logger,
    DecodeMode, InspectOptions, StreamInfo, BlockInfo, TokenCounts
} from './runpack/types.js';
export { measure, summarize } from './runpack/metrics.js';
export type { Timed, SizeSample, SizeSummary } from './runpack/metrics.js';

// Harness
export { roundTrip, testFile, findFirstMismatch } from './harness/roundtrip.js';
export type { RoundTripOptions } from './harness/roundtrip.js';
export { testFolder } from './harness/folder.js';
export type { FolderTestOptions, FolderTestResult } from './harness/folder.js';
export type { RoundTripReport } from './harness/report.js';
export { generateMixedData, generateRandomData } from './harness/generate.js';
export { FileAccess } from './io/file-access.js';

// The runpack Namespace Object
export const RunPack = {
    /**
     * Compresses a byte buffer into the framed run-length format.
     */
    compress,

    /**
     * Restores the original bytes from a compressed buffer.
     */
    decompress,

    /**
     * Validates a compressed buffer and reports its block layout WITHOUT decoding it.
     */
    inspect,

    /**
     * True when `data` decodes cleanly under the given mode.
     */
    verify: (data: Uint8Array, mode: DecodeMode = 'strict'): boolean => {
        try {
            inspect(data, { mode });
            return true;
        } catch (err: unknown) {
            if (err instanceof MalformedInputError) return false;
            throw err;
        }
    },
};

export default RunPack;
