import { RunPackError } from '../runpack/errors.js';

export class UsageError extends RunPackError {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export type CliCommand =
    | { kind: 'compress'; input: string; output: string }
    | { kind: 'decompress'; input: string; output: string }
    | { kind: 'inspect'; input: string; strict: boolean }
    | { kind: 'test'; file?: string; seed?: number; baseline: boolean }
    | { kind: 'test-folder'; dir?: string; log?: string; baseline: boolean }
    | { kind: 'help' }
    | { kind: 'version' };

export interface ParsedArgs {
    command: CliCommand;
    verbose: boolean;
}

export const USAGE = `Usage: runpack [--verbose] <command> [args]

Commands:
  compress <input> <output>      Compress a file
  decompress <input> <output>    Decompress a file
  inspect <input> [--strict]     Show the block and token layout of a compressed file
  test [file] [--seed N]         Round-trip generated data, or a real file
       [--baseline]              Also report the zstd ratio
  test-folder [--dir DIR]        Round-trip every file in a folder (default: test_data)
              [--log FILE]       Log destination (default: test_log.txt)
              [--baseline]

Options:
  --verbose                      Print progress details
  --help, -h                     Show this help
  --version, -V                  Show the version`;

const BOOLEAN_FLAGS = new Set(['verbose', 'strict', 'baseline', 'help', 'version']);
const VALUE_FLAGS = new Set(['seed', 'dir', 'log']);
const SHORT_FLAGS: Record<string, string> = { '-h': 'help', '-V': 'version' };

interface RawArgs {
    positionals: string[];
    flags: Set<string>;
    values: Map<string, string>;
}

function splitArgs(argv: string[]): RawArgs {
    const positionals: string[] = [];
    const flags = new Set<string>();
    const values = new Map<string, string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const short = SHORT_FLAGS[arg];
        if (short !== undefined) {
            flags.add(short);
            continue;
        }
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const [name, inline] = arg.slice(2).split('=', 2);
        if (BOOLEAN_FLAGS.has(name)) {
            if (inline !== undefined) throw new UsageError(`--${name} does not take a value`);
            flags.add(name);
        } else if (VALUE_FLAGS.has(name)) {
            const value = inline ?? argv[++i];
            if (value === undefined || value === '') throw new UsageError(`--${name} requires a value`);
            values.set(name, value);
        } else {
            throw new UsageError(`Unknown option: --${name}`);
        }
    }
    return { positionals, flags, values };
}

function expectPositionals(command: string, rest: string[], min: number, max: number): void {
    if (rest.length < min) throw new UsageError(`${command}: missing argument(s)`);
    if (rest.length > max) throw new UsageError(`${command}: unexpected argument '${rest[max]}'`);
}

function parseSeed(raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined;
    const seed = Number(raw);
    if (!Number.isSafeInteger(seed)) throw new UsageError(`--seed must be an integer, got '${raw}'`);
    return seed;
}

/** Parses `process.argv.slice(2)`-style arguments. */
export function parseArgs(argv: string[]): ParsedArgs {
    const { positionals, flags, values } = splitArgs(argv);
    const verbose = flags.has('verbose');

    if (flags.has('help')) return { command: { kind: 'help' }, verbose };
    if (flags.has('version')) return { command: { kind: 'version' }, verbose };

    const name: string | undefined = positionals[0];
    const rest = positionals.slice(1);
    switch (name) {
        case 'compress':
        case 'decompress':
            expectPositionals(name, rest, 2, 2);
            return { command: { kind: name, input: rest[0], output: rest[1] }, verbose };
        case 'inspect':
            expectPositionals(name, rest, 1, 1);
            return { command: { kind: 'inspect', input: rest[0], strict: flags.has('strict') }, verbose };
        case 'test':
            expectPositionals(name, rest, 0, 1);
            return {
                command: { kind: 'test', file: rest[0], seed: parseSeed(values.get('seed')), baseline: flags.has('baseline') },
                verbose,
            };
        case 'test-folder':
            expectPositionals(name, rest, 0, 0);
            return {
                command: { kind: 'test-folder', dir: values.get('dir'), log: values.get('log'), baseline: flags.has('baseline') },
                verbose,
            };
        case undefined:
            throw new UsageError('No command given');
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }
}
