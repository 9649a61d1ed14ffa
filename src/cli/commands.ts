import { compress } from '../runpack/encode.js';
import { decompress } from '../runpack/decode.js';
import { inspect } from '../runpack/inspect.js';
import { measure } from '../runpack/metrics.js';
import type { RunPackLogger } from '../runpack/types.js';
import { FileAccess } from '../io/file-access.js';
import { generateMixedData } from '../harness/generate.js';
import { roundTrip, testFile } from '../harness/roundtrip.js';
import { testFolder } from '../harness/folder.js';
import { formatDuration, formatSummary, type RoundTripReport } from '../harness/report.js';
import { USAGE, type CliCommand } from './args.js';
import type { CliConfig } from './config.js';
import type { LineWriter } from './logger.js';

export const RUNPACK_VERSION = '1.0.0';

export interface CliContext {
    config: CliConfig;
    logger: RunPackLogger;
    print: LineWriter;
    /** Milliseconds since the epoch; seeds generated data and stamps folder logs. */
    now?: () => number;
}

async function runCompress(input: string, output: string, ctx: CliContext): Promise<void> {
    ctx.logger.info?.(`Reading input file ${input}`);
    const data = await FileAccess.readBytes(input);
    const { result, elapsedMs } = measure(() => compress(data, { logger: ctx.logger }));
    ctx.logger.info?.(`Writing compressed output to ${output}`);
    await FileAccess.writeBytes(output, result);

    const ratio = data.length > 0 ? result.length / data.length : 0;
    ctx.print(
        `Compressed ${input} (${data.length} bytes) to ${output} (${result.length} bytes) ` +
        `in ${formatDuration(elapsedMs)}. Ratio: ${ratio.toFixed(2)}`,
    );
}

async function runDecompress(input: string, output: string, ctx: CliContext): Promise<void> {
    ctx.logger.info?.(`Reading compressed input ${input}`);
    const data = await FileAccess.readBytes(input);
    const { result, elapsedMs } = measure(() => decompress(data, { logger: ctx.logger }));
    ctx.logger.info?.(`Writing decompressed output to ${output}`);
    await FileAccess.writeBytes(output, result);

    ctx.print(
        `Decompressed ${input} (${data.length} bytes) to ${output} (${result.length} bytes) ` +
        `in ${formatDuration(elapsedMs)}.`,
    );
}

async function runInspect(input: string, strict: boolean, ctx: CliContext): Promise<void> {
    const data = await FileAccess.readBytes(input);
    const info = inspect(data, { mode: strict ? 'strict' : 'lenient' });

    ctx.print(`${input}: ${info.blockCount} block(s), ${info.compressedBytes} bytes -> ${info.decodedBytes} bytes`);
    for (const block of info.blocks) {
        const { literal, escaped, run } = block.tokens;
        ctx.print(
            `  block ${block.index} @${block.offset}: payload ${block.payloadBytes} bytes, ` +
            `decoded ${block.decodedBytes} bytes, tokens literal=${literal} escaped=${escaped} run=${run}`,
        );
    }
    if (info.trailingBytes > 0) {
        ctx.print(`  ${info.trailingBytes} trailing byte(s) after the last block`);
    }
}

function printReport(report: RoundTripReport, ctx: CliContext): void {
    for (const line of formatSummary(report)) ctx.print(line);
    ctx.print('Round trip verified: data is identical.');
}

async function runTest(command: Extract<CliCommand, { kind: 'test' }>, ctx: CliContext): Promise<void> {
    const options = { logger: ctx.logger, baseline: command.baseline };
    if (command.file !== undefined) {
        ctx.print(`Testing with real file: ${command.file}`);
        printReport(await testFile(command.file, options), ctx);
        return;
    }

    const seed = command.seed ?? (ctx.now ?? Date.now)();
    const data = generateMixedData({ seed });
    ctx.print(`Generated ${data.length} bytes of mixed test data (seed ${seed})`);
    printReport(await roundTrip(data, { ...options, label: 'generated' }), ctx);
}

async function runTestFolder(baseline: boolean, ctx: CliContext): Promise<void> {
    const { testDataDir, testLogPath } = ctx.config;
    const result = await testFolder(testDataDir, {
        logPath: testLogPath,
        baseline,
        logger: ctx.logger,
        now: ctx.now,
        onFile: (report) => ctx.print(`Tested ${report.label} successfully.`),
    });

    if (result.logPath === null) {
        ctx.print(`No files found in '${testDataDir}'.`);
    } else {
        ctx.print(`All tests complete. Log written to '${result.logPath}'.`);
    }
}

/** Runs one parsed command and returns the process exit code. */
export async function runCommand(command: CliCommand, ctx: CliContext): Promise<number> {
    switch (command.kind) {
        case 'help':
            ctx.print(USAGE);
            return 0;
        case 'version':
            ctx.print(`runpack ${RUNPACK_VERSION}`);
            return 0;
        case 'compress':
            await runCompress(command.input, command.output, ctx);
            return 0;
        case 'decompress':
            await runDecompress(command.input, command.output, ctx);
            return 0;
        case 'inspect':
            await runInspect(command.input, command.strict, ctx);
            return 0;
        case 'test':
            await runTest(command, ctx);
            return 0;
        case 'test-folder':
            await runTestFolder(command.baseline, ctx);
            return 0;
    }
}
