import * as path from "node:path";

import { AnalysisError, ChecksumUnavailableError, describeError, isNodeError } from "../../shared/errors";
import type { Logger } from "../../shared/logger";
import type { ArchiveEntry } from "../archiveReader";
import { computeFileCrc32, type ExtractedFile } from "../contentAnalyzer";

export type ChecksumStatus = "match" | "mismatch" | "missing-on-disk" | "missing-in-archive";

export interface ChecksumRecord {
    readonly path: string;
    /** `null` when the archive does not list the file; distinct from a CRC of zero. */
    readonly archiveChecksum: number | null;
    /** `null` when the file was not found on disk. */
    readonly extractedChecksum: number | null;
    readonly status: ChecksumStatus;
}

export interface ReconciliationReport {
    /** Sorted by path. */
    readonly records: readonly ChecksumRecord[];
    readonly matchCount: number;
    readonly mismatchCount: number;
    readonly anomalies: readonly ChecksumUnavailableError[];
}

export interface ReconcileOptions {
    readonly extractionDirectory: string;
    readonly chunkSize?: number;
    readonly logger?: Logger;
}

/** A record matches only when both checksums are present and equal. */
export function classifyRecord(archiveChecksum: number | null, extractedChecksum: number | null): ChecksumStatus {
    if (archiveChecksum === null) {
        return "missing-in-archive";
    }

    if (extractedChecksum === null) {
        return "missing-on-disk";
    }

    return archiveChecksum === extractedChecksum ? "match" : "mismatch";
}

/**
 * Pairs the CRC-32 stored for each archive entry with a CRC-32 recomputed from
 * the bytes currently on disk. Only classifies; nothing is repaired.
 */
export async function reconcileChecksums(
    entries: readonly ArchiveEntry[],
    files: readonly ExtractedFile[],
    options: ReconcileOptions,
): Promise<ReconciliationReport> {
    const archiveSide = new Map<string, number>();
    const diskSide = new Map<string, number>();

    for (const entry of entries) {
        if (entry.isDirectory || !entry.path) {
            continue;
        }

        archiveSide.set(entry.path, entry.crc32);
    }

    for (const file of files) {
        const absolute = path.join(options.extractionDirectory, ...file.path.split("/"));

        try {
            diskSide.set(file.path, await computeFileCrc32(absolute, options.chunkSize));
        } catch (error) {
            // Removed since the analysis: reported as missing on disk.
            if (isNodeError(error) && error.code === "ENOENT") {
                continue;
            }

            throw new AnalysisError(`Unable to checksum ${absolute}: ${describeError(error)}`, {
                cause: error,
                path: absolute,
            });
        }
    }

    const keys = [...new Set([...archiveSide.keys(), ...diskSide.keys()])].sort();
    const records: ChecksumRecord[] = [];
    const anomalies: ChecksumUnavailableError[] = [];
    let matchCount = 0;

    for (const key of keys) {
        const archiveChecksum = archiveSide.get(key) ?? null;
        const extractedChecksum = diskSide.get(key) ?? null;
        const status = classifyRecord(archiveChecksum, extractedChecksum);

        records.push({ path: key, archiveChecksum, extractedChecksum, status });

        if (status === "match") {
            matchCount += 1;
        } else if (status === "missing-on-disk") {
            anomalies.push(new ChecksumUnavailableError(key, "disk"));
        } else if (status === "missing-in-archive") {
            anomalies.push(new ChecksumUnavailableError(key, "archive"));
        }
    }

    const mismatchCount = records.length - matchCount;

    if (mismatchCount > 0) {
        options.logger?.warn("Checksum reconciliation found mismatches", {
            mismatchCount,
            anomalies: anomalies.length,
        });
    }

    return { records, matchCount, mismatchCount, anomalies };
}
