export interface RoundTripReport {
    label: string;
    originalBytes: number;
    compressedBytes: number;
    /** compressedBytes / originalBytes */
    ratio: number;
    compressMs: number;
    decompressMs: number;
    compressBytesPerSecond: number;
    decompressBytesPerSecond: number;
    /** Present only when a baseline compressor was run. */
    baselineBytes?: number;
    baselineRatio?: number;
}

export function formatDuration(ms: number): string {
    return `${ms.toFixed(3)}ms`;
}

/** One folder-log entry; `timestampSeconds` is Unix time. */
export function formatLogEntry(report: RoundTripReport, timestampSeconds: number): string {
    const lines = [
        `Timestamp: ${timestampSeconds}s`,
        `File: ${report.label}`,
        `Original Size: ${report.originalBytes} bytes`,
        `Compressed Size: ${report.compressedBytes} bytes`,
        `Ratio: ${report.ratio.toFixed(2)}`,
        `Compress Time: ${formatDuration(report.compressMs)}`,
        `Compress Speed: ${report.compressBytesPerSecond.toFixed(2)} bytes/s`,
        `Decompress Time: ${formatDuration(report.decompressMs)}`,
        `Decompress Speed: ${report.decompressBytesPerSecond.toFixed(2)} bytes/s`,
    ];
    if (report.baselineRatio !== undefined) {
        lines.push(`Baseline Ratio (zstd): ${report.baselineRatio.toFixed(2)}`);
    }
    lines.push('---');
    return lines.join('\n');
}

export function formatLog(entries: string[]): string {
    return entries.join('\n\n');
}

/** Human-readable summary lines for a single round trip. */
export function formatSummary(report: RoundTripReport): string[] {
    const lines = [
        `Original size: ${report.originalBytes} bytes`,
        `Compressed size: ${report.compressedBytes} bytes (ratio: ${report.ratio.toFixed(2)})`,
        `Compression time: ${formatDuration(report.compressMs)}`,
        `Decompressed size: ${report.originalBytes} bytes`,
        `Decompression time: ${formatDuration(report.decompressMs)}`,
    ];
    if (report.baselineBytes !== undefined && report.baselineRatio !== undefined) {
        lines.push(`Baseline (zstd) size: ${report.baselineBytes} bytes (ratio: ${report.baselineRatio.toFixed(2)})`);
    }
    return lines;
}
