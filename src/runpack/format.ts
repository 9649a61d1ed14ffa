/** Upper bound on the raw bytes covered by one block (256 KiB). */
export const MAX_BLOCK_SIZE = 256 * 1024;
export const DEFAULT_BLOCK_SIZE = MAX_BLOCK_SIZE;

/** Shortest run worth a run token; a 2-run costs 2 bytes as literals anyway. */
export const MIN_RUN = 3;
/** The run-length field is a single byte. */
export const MAX_RUN = 0xFF;

export const RUN_FLAG = 0xFE;
export const ESCAPE_FLAG = 0xFF;

// Stream layout:
// [block_count (u32 BE)] then per block: [payload_len (u32 BE)] [payload]
export const BLOCK_COUNT_SIZE = 4;
export const BLOCK_LENGTH_SIZE = 4;

export const RUN_TOKEN_SIZE = 3;
export const ESCAPED_TOKEN_SIZE = 2;
export const LITERAL_TOKEN_SIZE = 1;

/** No cap on decoded size unless the caller sets `maxOutputBytes`. */
export const DEFAULT_MAX_OUTPUT_BYTES = Number.MAX_SAFE_INTEGER;

export function isFlagByte(value: number): boolean {
    return value === RUN_FLAG || value === ESCAPE_FLAG;
}

export function blockCountFor(length: number, blockSize: number = DEFAULT_BLOCK_SIZE): number {
    return Math.ceil(length / blockSize);
}
