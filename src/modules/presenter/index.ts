import { formatChecksum } from "../../shared/crc32";
import { formatBytes, formatRatio } from "../../shared/format";
import type { AnalysisSummary } from "../contentAnalyzer";
import type { ChecksumRecord, ReconciliationReport } from "../integrityReconciler";
import type { OperatorChannel } from "../operator";

/** Fixed lines printed before the content-type table. */
export const SUMMARY_LINE_COUNT = 5;

export interface RunTotals {
    readonly processed: number;
    readonly verified: number;
    readonly deleted: number;
    readonly skipped: number;
}

export function formatCompression(ratio: number, totalSize: number, archiveSize: number): string {
    return `${formatRatio(ratio)} (${formatBytes(totalSize)} -> ${formatBytes(archiveSize)})`;
}

export function summaryLines(summary: AnalysisSummary, compressionRatio: number): string[] {
    const largest = summary.largestFile
        ? `${summary.largestFile.path} (${formatBytes(summary.largestFile.size)})`
        : "none";

    return [
        `Files:        ${summary.totalFiles}`,
        `Folders:      ${summary.totalFolders}`,
        `Total size:   ${formatBytes(summary.totalSize)}`,
        `Largest file: ${largest}`,
        `Compression:  ${formatCompression(compressionRatio, summary.totalSize, summary.archiveSize)}`,
    ];
}

/** Content types by descending count, ties broken by type name. */
export function contentTypeRows(contentTypes: ReadonlyMap<string, number>): [string, string][] {
    return [...contentTypes.entries()]
        .sort(([leftType, leftCount], [rightType, rightCount]) =>
            rightCount - leftCount || (leftType < rightType ? -1 : leftType > rightType ? 1 : 0),
        )
        .map(([type, count]) => [type, String(count)]);
}

export function presentSummary(
    channel: OperatorChannel,
    summary: AnalysisSummary,
    compressionRatio: number,
    maxInfoLines: number,
): void {
    for (const line of summaryLines(summary, compressionRatio)) {
        channel.printLine(line);
    }

    const rows = contentTypeRows(summary.contentTypes);

    if (rows.length === 0) {
        return;
    }

    const budget = Math.max(1, maxInfoLines - SUMMARY_LINE_COUNT);
    const visible = rows.slice(0, budget);
    channel.printTable(["Content type", "Files"], visible);

    if (rows.length > visible.length) {
        channel.printLine(`... and ${rows.length - visible.length} more content types`);
    }
}

export function describeRecord(record: ChecksumRecord): string {
    switch (record.status) {
        case "match":
            return `${record.path}: ${formatChecksum(record.extractedChecksum ?? 0)}`;
        case "mismatch":
            return `${record.path}: archive ${formatChecksum(record.archiveChecksum ?? 0)}, extracted ${formatChecksum(
                record.extractedChecksum ?? 0,
            )}`;
        case "missing-on-disk":
            return `${record.path}: listed in the archive, missing on disk`;
        case "missing-in-archive":
            return `${record.path}: found on disk, not listed in the archive`;
    }
}

export function presentChecksums(channel: OperatorChannel, report: ReconciliationReport, previewCount: number): void {
    const preview = report.records.slice(0, previewCount);

    if (preview.length > 0) {
        channel.printLine("Checksums:");

        for (const record of preview) {
            channel.printLine(`  ${describeRecord(record)}`);
        }

        if (report.records.length > preview.length) {
            channel.printLine(`  ... and ${report.records.length - preview.length} more`);
        }
    }

    if (report.mismatchCount === 0) {
        channel.printLine(`All ${report.matchCount} checksums match.`);
        return;
    }

    channel.printLine(`${report.mismatchCount} of ${report.records.length} checksums do not match:`);

    for (const record of report.records) {
        if (record.status !== "match") {
            channel.printLine(`  ${describeRecord(record)}`);
        }
    }
}

export function presentRunTotals(channel: OperatorChannel, totals: RunTotals): void {
    channel.printLine(
        `Processed ${totals.processed} archive(s): ${totals.verified} verified, ${totals.deleted} deleted, ${totals.skipped} skipped.`,
    );
}
