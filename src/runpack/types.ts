export type RunPackLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type RunPackEncoderOptions = {
    /** Raw bytes per block (1-262144). Default: 262144. */
    blockSize?: number;
    /** Optional logger hook; receives one summary line per call. */
    logger?: RunPackLogger | null;
};

/**
 * - 'lenient' (default): accept any well-framed token stream, ignore bytes after the last block.
 * - 'strict': also reject individual tokens the encoder never emits (short runs, escaped
 *   non-flag values), empty or oversized blocks and trailing bytes. Each token is checked
 *   on its own; a sequence of valid tokens the encoder would have merged still passes.
 */
export type DecodeMode = 'lenient' | 'strict';

export type RunPackDecoderOptions = {
    mode?: DecodeMode;
    /** Hard cap on decoded size in bytes. Default: no cap (Number.MAX_SAFE_INTEGER). */
    maxOutputBytes?: number;
    /** Optional logger for warnings (trailing data in lenient mode). */
    logger?: RunPackLogger | null;
};

export type InspectOptions = Pick<RunPackDecoderOptions, 'mode' | 'maxOutputBytes'>;

export interface TokenCounts {
    literal: number;
    escaped: number;
    run: number;
}

export interface BlockInfo {
    index: number;
    /** Offset of the block's length prefix in the compressed buffer. */
    offset: number;
    payloadBytes: number;
    decodedBytes: number;
    tokens: TokenCounts;
}

export interface StreamInfo {
    blockCount: number;
    compressedBytes: number;
    decodedBytes: number;
    trailingBytes: number;
    blocks: BlockInfo[];
}
