#!/usr/bin/env node
/**
 * CLI: runpack
 *
 * Usage:  tsx src/cli/main.ts [--verbose] <command> [args]   (see --help)
 */

import { parseArgs, UsageError, USAGE, type ParsedArgs } from './args.js';
import { resolveConfig } from './config.js';
import { createCliLogger } from './logger.js';
import { runCommand } from './commands.js';

const stdout = (line: string) => { process.stdout.write(`${line}\n`); };
const stderr = (line: string) => { process.stderr.write(`${line}\n`); };

async function main(argv: string[]): Promise<number> {
    let parsed: ParsedArgs;
    try {
        parsed = parseArgs(argv);
    } catch (err: unknown) {
        if (!(err instanceof UsageError)) throw err;
        stderr(`Error: ${err.message}`);
        stderr(USAGE);
        return 2;
    }

    const config = resolveConfig(parsed);
    const logger = createCliLogger(config.verbose, stderr, stdout);
    return runCommand(parsed.command, { config, logger, print: stdout });
}

try {
    process.exitCode = await main(process.argv.slice(2));
} catch (err: unknown) {
    stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
}
