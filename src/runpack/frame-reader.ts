import { TruncatedBufferError } from './errors.js';

/**
 * Bounds-checked cursor over the framing fields of a compressed buffer.
 * All multi-byte fields are big-endian.
 */
export class FrameReader {
    private pos: number = 0;
    private readonly view: DataView;

    constructor(private readonly data: Uint8Array) {
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get offset(): number {
        return this.pos;
    }

    get remaining(): number {
        return this.data.length - this.pos;
    }

    getUint32(field: string, blockIndex?: number): number {
        if (this.remaining < 4) {
            throw new TruncatedBufferError(
                `Unexpected end of data (${field}: need 4 bytes at offset ${this.pos}, ${this.remaining} left)`,
                { offset: this.pos, blockIndex },
            );
        }
        const val = this.view.getUint32(this.pos, false);
        this.pos += 4;
        return val;
    }

    skip(length: number, blockIndex?: number): void {
        if (length > this.remaining) {
            throw new TruncatedBufferError(
                `Unexpected end of data (skip ${length} bytes at offset ${this.pos}, ${this.remaining} left)`,
                { offset: this.pos, blockIndex },
            );
        }
        this.pos += length;
    }
}
