export class RunPackError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'RunPackError';
    }
}

export interface MalformedInputDetails {
    /** Byte offset into the compressed buffer where decoding stopped. */
    offset: number;
    /** Index of the block being read, when the failure is inside one. */
    blockIndex?: number;
}

export class MalformedInputError extends RunPackError {
    public readonly offset: number;
    public readonly blockIndex: number | undefined;

    constructor(message: string, details: MalformedInputDetails) {
        super(message);
        this.name = 'MalformedInputError';
        this.offset = details.offset;
        this.blockIndex = details.blockIndex;
    }
}

/** A declared length or token operand runs past the end of the data. */
export class TruncatedBufferError extends MalformedInputError {
    constructor(message: string, details: MalformedInputDetails) {
        super(message, details);
        this.name = 'TruncatedBufferError';
    }
}

export class LimitExceededError extends RunPackError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

export class InvalidOptionError extends RunPackError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOptionError';
    }
}

export class RoundTripMismatchError extends RunPackError {
    constructor(
        message: string,
        public readonly firstMismatchOffset: number,
        public readonly expectedLength: number,
        public readonly actualLength: number,
    ) {
        super(message);
        this.name = 'RoundTripMismatchError';
    }
}

export type FileOperation = 'read' | 'write' | 'list';

export class FileAccessError extends RunPackError {
    constructor(
        message: string,
        public readonly path: string,
        public readonly operation: FileOperation,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'FileAccessError';
    }
}
