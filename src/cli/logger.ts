import type { RunPackLogger } from '../runpack/types.js';

export type LineWriter = (line: string) => void;

/** info is only emitted under --verbose; warn and error always go to stderr. */
export function createCliLogger(verbose: boolean, stderr: LineWriter, stdout: LineWriter): RunPackLogger {
    return {
        info: verbose ? (msg) => stdout(`Verbose: ${msg}`) : undefined,
        warn: (msg) => stderr(`Warning: ${msg}`),
        error: (msg) => stderr(`Error: ${msg}`),
    };
}
