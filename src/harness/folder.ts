import * as path from 'node:path';
import { FileAccess } from '../io/file-access.js';
import { roundTrip, type RoundTripOptions } from './roundtrip.js';
import { formatLog, formatLogEntry, type RoundTripReport } from './report.js';

export type FolderTestOptions = Omit<RoundTripOptions, 'label'> & {
    /** Where the per-file log is written. Default: test_log.txt */
    logPath?: string;
    /** Clock in milliseconds since the epoch; used for log timestamps. */
    now?: () => number;
    /** Called after each file passes. */
    onFile?: (report: RoundTripReport) => void;
};

export interface FolderTestResult {
    reports: RoundTripReport[];
    /** Null when the folder held no files and no log was written. */
    logPath: string | null;
}

/**
 * Round-trips every regular file directly inside `dir` (in name order) and
 * writes one log entry per file. The first mismatch aborts the run.
 */
export async function testFolder(dir: string, options: FolderTestOptions = {}): Promise<FolderTestResult> {
    const { logPath = 'test_log.txt', now = Date.now, onFile, ...roundTripOptions } = options;
    const files = await FileAccess.listFiles(dir);

    const reports: RoundTripReport[] = [];
    const entries: string[] = [];
    for (const file of files) {
        const data = await FileAccess.readBytes(file);
        roundTripOptions.logger?.info?.(`Processing file ${path.basename(file)} (${data.length} bytes)`);
        const report = await roundTrip(data, { ...roundTripOptions, label: path.basename(file) });
        reports.push(report);
        entries.push(formatLogEntry(report, Math.floor(now() / 1000)));
        onFile?.(report);
    }

    if (reports.length === 0) {
        return { reports, logPath: null };
    }

    await FileAccess.writeBytes(logPath, formatLog(entries));
    return { reports, logPath };
}
