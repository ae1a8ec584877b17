import { createReadStream, promises as fsPromises } from "node:fs";
import * as path from "node:path";

import { AnalysisError, describeError } from "../../shared/errors";
import { Crc32 } from "../../shared/crc32";
import type { Logger } from "../../shared/logger";
import { sniffContentType } from "../contentSniffer";

const { lstat, readdir, stat } = fsPromises;

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface ExtractedFile {
    /** Path relative to the extraction directory, `/`-separated. */
    readonly path: string;
    readonly size: number;
    readonly contentType: string;
    readonly crc32: number;
}

export interface LargestFile {
    readonly path: string;
    readonly size: number;
}

export interface AnalysisSummary {
    readonly totalFiles: number;
    readonly totalFolders: number;
    readonly totalSize: number;
    readonly largestFile: LargestFile | null;
    readonly contentTypes: ReadonlyMap<string, number>;
    readonly archiveSize: number;
    /** Files in traversal order. */
    readonly files: readonly ExtractedFile[];
}

export interface AnalyzeOptions {
    readonly archivePath: string;
    readonly chunkSize?: number;
    readonly logger?: Logger;
    readonly sniff?: (filePath: string) => Promise<string>;
}

interface MutableTotals {
    totalFiles: number;
    totalFolders: number;
    totalSize: number;
    largestFile: LargestFile | null;
    readonly contentTypes: Map<string, number>;
    readonly files: ExtractedFile[];
}

/**
 * Walks the extracted tree once and gathers per-file records together with the
 * aggregate totals. Within a directory, names are visited in ascending order
 * and files come before subdirectories, so the traversal order is stable.
 * Rejects with {@link AnalysisError} when the tree or the archive cannot be read.
 */
export async function analyzeExtractedContent(directory: string, options: AnalyzeOptions): Promise<AnalysisSummary> {
    const root = path.resolve(directory);
    const totals: MutableTotals = {
        totalFiles: 0,
        totalFolders: 0,
        totalSize: 0,
        largestFile: null,
        contentTypes: new Map(),
        files: [],
    };

    try {
        await walk(root, root, totals, options);
    } catch (error) {
        if (error instanceof AnalysisError) {
            throw error;
        }

        throw new AnalysisError(`Unable to analyze ${root}: ${describeError(error)}`, { cause: error, path: root });
    }

    let archiveSize: number;

    try {
        archiveSize = (await stat(options.archivePath)).size;
    } catch (error) {
        throw new AnalysisError(`Unable to read the size of ${options.archivePath}: ${describeError(error)}`, {
            cause: error,
            path: options.archivePath,
        });
    }

    options.logger?.debug("Analyzed extracted content", {
        directory: root,
        totalFiles: totals.totalFiles,
        totalFolders: totals.totalFolders,
        totalSize: totals.totalSize,
    });

    return {
        totalFiles: totals.totalFiles,
        totalFolders: totals.totalFolders,
        totalSize: totals.totalSize,
        largestFile: totals.largestFile,
        contentTypes: totals.contentTypes,
        archiveSize,
        files: totals.files,
    };
}

async function walk(root: string, current: string, totals: MutableTotals, options: AnalyzeOptions): Promise<void> {
    const entries = await readdir(current, { withFileTypes: true });
    const names = entries.map((entry) => entry.name).sort(compareNames);
    const subdirectories: string[] = [];

    for (const name of names) {
        const absolute = path.join(current, name);
        const stats = await lstat(absolute);

        if (stats.isDirectory()) {
            subdirectories.push(absolute);
            continue;
        }

        if (!stats.isFile()) {
            options.logger?.debug("Skipping non-regular file", { path: absolute });
            continue;
        }

        const relative = toRelativeKey(root, absolute);
        const contentType = await (options.sniff ?? sniffContentType)(absolute);
        const checksum = await computeFileCrc32(absolute, options.chunkSize);
        const file: ExtractedFile = {
            path: relative,
            size: stats.size,
            contentType,
            crc32: checksum,
        };

        totals.files.push(file);
        totals.totalFiles += 1;
        totals.totalSize += stats.size;
        totals.contentTypes.set(contentType, (totals.contentTypes.get(contentType) ?? 0) + 1);

        if (totals.largestFile === null || stats.size > totals.largestFile.size) {
            totals.largestFile = { path: relative, size: stats.size };
        }
    }

    for (const subdirectory of subdirectories) {
        totals.totalFolders += 1;
        await walk(root, subdirectory, totals, options);
    }
}

/**
 * Streams the file through CRC-32 in `chunkSize` pieces. The digest does not
 * depend on the chunk size.
 */
export async function computeFileCrc32(filePath: string, chunkSize: number = DEFAULT_CHUNK_SIZE): Promise<number> {
    const checksum = new Crc32();
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });

    for await (const chunk of stream) {
        checksum.update(toBytes(chunk));
    }

    return checksum.digest();
}

export function toRelativeKey(root: string, absolute: string): string {
    return path.relative(root, absolute).split(path.sep).join("/");
}

function compareNames(left: string, right: string): number {
    if (left === right) {
        return 0;
    }

    return left < right ? -1 : 1;
}

function toBytes(chunk: unknown): Uint8Array {
    if (chunk instanceof Uint8Array) {
        return chunk;
    }

    return Buffer.from(String(chunk));
}
