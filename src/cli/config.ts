import type { ParsedArgs } from './args.js';

export interface CliConfig {
    verbose: boolean;
    testDataDir: string;
    testLogPath: string;
}

const DEFAULT_TEST_DATA_DIR = 'test_data';
const DEFAULT_TEST_LOG_PATH = 'test_log.txt';

/** Arguments win over environment variables, which win over defaults. */
export function resolveConfig(args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): CliConfig {
    const { command } = args;
    const dirArg = command.kind === 'test-folder' ? command.dir : undefined;
    const logArg = command.kind === 'test-folder' ? command.log : undefined;

    return {
        verbose: args.verbose || env.RUNPACK_VERBOSE === '1',
        testDataDir: dirArg ?? env.RUNPACK_TEST_DATA_DIR ?? DEFAULT_TEST_DATA_DIR,
        testLogPath: logArg ?? env.RUNPACK_TEST_LOG ?? DEFAULT_TEST_LOG_PATH,
    };
}
