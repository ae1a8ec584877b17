import { createReadStream, createWriteStream, promises as fsPromises } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as path from "node:path";
import { Transform, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createInflateRaw } from "node:zlib";

import { ExtractionError, InvalidArchiveError, describeError, isNodeError } from "../../shared/errors";
import type { Logger } from "../../shared/logger";

const { chmod, mkdir, open, rm, writeFile } = fsPromises;

const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
const ZIP64_END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06064b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const LOCAL_FILE_HEADER_SIGNATURE = 0x04034b50;

const END_RECORD_SIZE = 22;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_END_RECORD_SIZE = 56;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIZE = 30;
const MAX_COMMENT_LENGTH = 0xffff;
const ZIP64_EXTRA_FIELD_ID = 0x0001;

const COMPRESSION_STORED = 0;
const COMPRESSION_DEFLATE = 8;

export interface ArchiveEntry {
    /** Normalized `/`-separated path; unique key of the entry inside the archive. */
    readonly path: string;
    readonly rawName: string;
    readonly size: number;
    readonly compressedSize: number;
    readonly crc32: number;
    readonly compressionMethod: number;
    readonly generalPurposeFlag: number;
    readonly externalAttributes: number;
    readonly localHeaderOffset: number;
    readonly isDirectory: boolean;
    readonly isEncrypted: boolean;
    readonly isSymbolicLink: boolean;
    readonly mode?: number;
}

export interface ArchiveListing {
    readonly archivePath: string;
    readonly archiveSize: number;
    readonly entries: readonly ArchiveEntry[];
}

export interface ExtractionProgress {
    readonly bytesWritten: number;
    readonly totalBytes: number;
    readonly entryPath: string;
}

export interface ExtractArchiveOptions {
    readonly onProgress?: (progress: ExtractionProgress) => void;
    readonly logger?: Logger;
    readonly highWaterMark?: number;
}

export interface ExtractionResult {
    readonly listing: ArchiveListing;
    readonly destination: string;
    readonly bytesWritten: number;
    readonly totalBytes: number;
    /** Relative paths of the files written completely, in extraction order. */
    readonly extractedFiles: readonly string[];
    readonly error?: ExtractionError;
}

interface EndOfCentralDirectory {
    readonly entryCount: number;
    readonly centralDirectorySize: number;
    readonly centralDirectoryOffset: number;
}

/**
 * Reads the central directory of a ZIP archive. Nothing is decompressed; the
 * stored CRC-32 of every entry comes straight from the directory listing.
 */
export async function readArchiveEntries(archivePath: string): Promise<ArchiveListing> {
    const handle = await openArchive(archivePath);

    try {
        return await readListing(handle, archivePath);
    } finally {
        await handle.close();
    }
}

/**
 * Streams every entry of the archive below `destination`. An entry that
 * cannot be written stops the extraction; what was written before it is kept
 * and the failure is returned in `error` so the caller can still analyse it.
 * Archives that cannot be read at all reject with {@link InvalidArchiveError}.
 */
export async function extractArchive(
    archivePath: string,
    destination: string,
    options: ExtractArchiveOptions = {},
): Promise<ExtractionResult> {
    const handle = await openArchive(archivePath);
    const destinationRoot = path.resolve(destination);

    try {
        const listing = await readListing(handle, archivePath);
        const totalBytes = listing.entries
            .filter((entry) => !entry.isDirectory)
            .reduce((sum, entry) => sum + entry.size, 0);
        const extractedFiles: string[] = [];
        let bytesWritten = 0;

        const reportChunk = (entryPath: string, chunkLength: number): void => {
            bytesWritten += chunkLength;
            options.onProgress?.({ bytesWritten, totalBytes, entryPath });
        };

        try {
            await mkdir(destinationRoot, { recursive: true });
        } catch (error) {
            return {
                listing,
                destination: destinationRoot,
                bytesWritten,
                totalBytes,
                extractedFiles,
                error: new ExtractionError(
                    `Unable to create destination directory ${destinationRoot}: ${describeError(error)}`,
                    { cause: error, path: destinationRoot },
                ),
            };
        }

        for (const entry of listing.entries) {
            try {
                const written = await extractEntry(handle, listing, entry, destinationRoot, options, reportChunk);

                if (written) {
                    extractedFiles.push(entry.path);
                }
            } catch (error) {
                const extractionError =
                    error instanceof ExtractionError
                        ? error
                        : new ExtractionError(`Failed to extract ${entry.rawName}: ${describeError(error)}`, {
                              cause: error,
                              path: entry.path,
                          });
                options.logger?.error("Extraction stopped", {
                    entry: entry.rawName,
                    error: extractionError.message,
                });

                return {
                    listing,
                    destination: destinationRoot,
                    bytesWritten,
                    totalBytes,
                    extractedFiles,
                    error: extractionError,
                };
            }
        }

        return { listing, destination: destinationRoot, bytesWritten, totalBytes, extractedFiles };
    } finally {
        await handle.close();
    }
}

async function openArchive(archivePath: string): Promise<FileHandle> {
    let handle: FileHandle;

    try {
        handle = await open(archivePath, "r");
    } catch (error) {
        const reason = isNodeError(error) && error.code === "ENOENT" ? "file does not exist" : describeError(error);
        throw new InvalidArchiveError(archivePath, reason, error);
    }

    try {
        const stats = await handle.stat();

        if (!stats.isFile()) {
            throw new InvalidArchiveError(archivePath, "not a regular file");
        }
    } catch (error) {
        await handle.close();
        throw error instanceof InvalidArchiveError ? error : new InvalidArchiveError(archivePath, describeError(error), error);
    }

    return handle;
}

async function readListing(handle: FileHandle, archivePath: string): Promise<ArchiveListing> {
    const { size: archiveSize } = await handle.stat();

    if (archiveSize === 0) {
        throw new InvalidArchiveError(archivePath, "file is empty");
    }

    if (archiveSize < END_RECORD_SIZE) {
        throw new InvalidArchiveError(archivePath, "file is too small to hold an end of central directory record");
    }

    const endRecord = await locateEndOfCentralDirectory(handle, archivePath, archiveSize);

    if (endRecord.centralDirectoryOffset + endRecord.centralDirectorySize > archiveSize) {
        throw new InvalidArchiveError(archivePath, "central directory extends beyond the end of the file");
    }

    const directory = await readExactly(
        handle,
        endRecord.centralDirectoryOffset,
        endRecord.centralDirectorySize,
    );

    if (!directory) {
        throw new InvalidArchiveError(archivePath, "central directory is truncated");
    }

    return {
        archivePath,
        archiveSize,
        entries: parseCentralDirectory(directory, endRecord.entryCount, archivePath),
    };
}

async function locateEndOfCentralDirectory(
    handle: FileHandle,
    archivePath: string,
    archiveSize: number,
): Promise<EndOfCentralDirectory> {
    const tailLength = Math.min(archiveSize, MAX_COMMENT_LENGTH + END_RECORD_SIZE);
    const tailStart = archiveSize - tailLength;
    const tail = await readExactly(handle, tailStart, tailLength);

    if (!tail) {
        throw new InvalidArchiveError(archivePath, "unable to read the end of the file");
    }

    for (let offset = tail.length - END_RECORD_SIZE; offset >= 0; offset -= 1) {
        if (tail.readUInt32LE(offset) !== END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
            continue;
        }

        const entryCount = tail.readUInt16LE(offset + 10);
        const centralDirectorySize = tail.readUInt32LE(offset + 12);
        const centralDirectoryOffset = tail.readUInt32LE(offset + 16);
        const needsZip64 =
            entryCount === 0xffff || centralDirectorySize === 0xffffffff || centralDirectoryOffset === 0xffffffff;

        if (needsZip64) {
            return readZip64EndOfCentralDirectory(handle, archivePath, tailStart + offset);
        }

        return { entryCount, centralDirectorySize, centralDirectoryOffset };
    }

    throw new InvalidArchiveError(archivePath, "end of central directory record not found");
}

async function readZip64EndOfCentralDirectory(
    handle: FileHandle,
    archivePath: string,
    endRecordOffset: number,
): Promise<EndOfCentralDirectory> {
    const locatorOffset = endRecordOffset - ZIP64_LOCATOR_SIZE;
    const locator = locatorOffset >= 0 ? await readExactly(handle, locatorOffset, ZIP64_LOCATOR_SIZE) : undefined;

    if (!locator || locator.readUInt32LE(0) !== ZIP64_LOCATOR_SIGNATURE) {
        throw new InvalidArchiveError(archivePath, "ZIP64 end of central directory locator not found");
    }

    const recordOffset = readUInt64(locator, 8);
    const record = await readExactly(handle, recordOffset, ZIP64_END_RECORD_SIZE);

    if (!record || record.readUInt32LE(0) !== ZIP64_END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
        throw new InvalidArchiveError(archivePath, "ZIP64 end of central directory record is corrupt");
    }

    return {
        entryCount: readUInt64(record, 32),
        centralDirectorySize: readUInt64(record, 40),
        centralDirectoryOffset: readUInt64(record, 48),
    };
}

function parseCentralDirectory(buffer: Buffer, entryCount: number, archivePath: string): ArchiveEntry[] {
    const entries: ArchiveEntry[] = [];
    let offset = 0;

    for (let index = 0; index < entryCount; index += 1) {
        if (offset + CENTRAL_HEADER_SIZE > buffer.length) {
            throw new InvalidArchiveError(archivePath, `central directory ends after ${index} of ${entryCount} entries`);
        }

        if (buffer.readUInt32LE(offset) !== CENTRAL_DIRECTORY_SIGNATURE) {
            throw new InvalidArchiveError(archivePath, "invalid central directory signature");
        }

        const generalPurposeFlag = buffer.readUInt16LE(offset + 8);
        const compressionMethod = buffer.readUInt16LE(offset + 10);
        const crc32 = buffer.readUInt32LE(offset + 16);
        const compressedSize32 = buffer.readUInt32LE(offset + 20);
        const uncompressedSize32 = buffer.readUInt32LE(offset + 24);
        const fileNameLength = buffer.readUInt16LE(offset + 28);
        const extraFieldLength = buffer.readUInt16LE(offset + 30);
        const commentLength = buffer.readUInt16LE(offset + 32);
        const externalAttributes = buffer.readUInt32LE(offset + 38);
        const localHeaderOffset32 = buffer.readUInt32LE(offset + 42);
        const fileNameStart = offset + CENTRAL_HEADER_SIZE;
        const extraStart = fileNameStart + fileNameLength;
        const nextOffset = extraStart + extraFieldLength + commentLength;

        if (nextOffset > buffer.length) {
            throw new InvalidArchiveError(archivePath, "central directory entry is truncated");
        }

        const rawName = buffer.toString("utf8", fileNameStart, extraStart);
        const sizes = applyZip64Extra(buffer.subarray(extraStart, extraStart + extraFieldLength), {
            size: uncompressedSize32,
            compressedSize: compressedSize32,
            localHeaderOffset: localHeaderOffset32,
        });
        const unixType = (externalAttributes >>> 16) & 0o170000;
        const isDirectory = detectDirectory(rawName, externalAttributes);

        entries.push({
            path: normalizeEntryPath(rawName),
            rawName,
            size: sizes.size,
            compressedSize: sizes.compressedSize,
            crc32,
            compressionMethod,
            generalPurposeFlag,
            externalAttributes,
            localHeaderOffset: sizes.localHeaderOffset,
            isDirectory,
            isEncrypted: (generalPurposeFlag & 0x01) !== 0,
            isSymbolicLink: unixType === 0o120000,
            mode: normalizeFileMode(externalAttributes >>> 16),
        });

        offset = nextOffset;
    }

    return entries;
}

interface EntrySizes {
    readonly size: number;
    readonly compressedSize: number;
    readonly localHeaderOffset: number;
}

function applyZip64Extra(extra: Buffer, sizes: EntrySizes): EntrySizes {
    let offset = 0;

    while (offset + 4 <= extra.length) {
        const headerId = extra.readUInt16LE(offset);
        const dataSize = extra.readUInt16LE(offset + 2);
        const dataStart = offset + 4;
        const dataEnd = dataStart + dataSize;

        if (dataEnd > extra.length) {
            break;
        }

        if (headerId === ZIP64_EXTRA_FIELD_ID) {
            const data = extra.subarray(dataStart, dataEnd);
            let cursor = 0;
            const next = (current: number): number => {
                if (current !== 0xffffffff || cursor + 8 > data.length) {
                    return current;
                }

                const value = readUInt64(data, cursor);
                cursor += 8;

                return value;
            };

            const size = next(sizes.size);
            const compressedSize = next(sizes.compressedSize);
            const localHeaderOffset = next(sizes.localHeaderOffset);

            return { size, compressedSize, localHeaderOffset };
        }

        offset = dataEnd;
    }

    return sizes;
}

async function extractEntry(
    handle: FileHandle,
    listing: ArchiveListing,
    entry: ArchiveEntry,
    destinationRoot: string,
    options: ExtractArchiveOptions,
    reportChunk: (entryPath: string, chunkLength: number) => void,
): Promise<boolean> {
    const targetPath = resolveEntryTarget(destinationRoot, entry);

    if (!targetPath) {
        return false;
    }

    if (entry.isDirectory) {
        await mkdir(targetPath, { recursive: true });

        return false;
    }

    ensureEntrySupported(entry);

    const dataOffset = await locateEntryData(handle, entry);
    const dataEnd = dataOffset + entry.compressedSize;

    if (dataEnd > listing.archiveSize) {
        throw new ExtractionError(`Entry data exceeds archive bounds: ${entry.rawName}`, { path: entry.path });
    }

    await mkdir(path.dirname(targetPath), { recursive: true });
    // A file left by an earlier run may carry read-only permissions.
    await rm(targetPath, { force: true });

    if (entry.compressedSize === 0) {
        if (entry.size !== 0) {
            throw new ExtractionError(`Entry ${entry.rawName} has no data but declares ${entry.size} bytes`, {
                path: entry.path,
            });
        }

        await writeFile(targetPath, Buffer.alloc(0));
    } else {
        const source = createReadStream(listing.archivePath, {
            start: dataOffset,
            end: dataEnd - 1,
            highWaterMark: options.highWaterMark,
        });
        const counter = new ByteCounter(entry, (chunkLength) => reportChunk(entry.path, chunkLength));
        const sink = createWriteStream(targetPath);

        if (entry.compressionMethod === COMPRESSION_DEFLATE) {
            await pipeline(source, createInflateRaw(), counter, sink);
        } else {
            await pipeline(source, counter, sink);
        }

        if (counter.bytes !== entry.size) {
            throw new ExtractionError(
                `Unexpected uncompressed size for ${entry.rawName}: expected ${entry.size}, wrote ${counter.bytes}`,
                { path: entry.path },
            );
        }
    }

    if (entry.mode !== undefined) {
        await chmod(targetPath, entry.mode);
    }

    options.logger?.debug("Extracted entry", { entry: entry.path, size: entry.size });

    return true;
}

async function locateEntryData(handle: FileHandle, entry: ArchiveEntry): Promise<number> {
    const header = await readExactly(handle, entry.localHeaderOffset, LOCAL_HEADER_SIZE);

    if (!header || header.readUInt32LE(0) !== LOCAL_FILE_HEADER_SIGNATURE) {
        throw new ExtractionError(`Invalid local file header for ${entry.rawName}`, { path: entry.path });
    }

    const fileNameLength = header.readUInt16LE(26);
    const extraFieldLength = header.readUInt16LE(28);

    return entry.localHeaderOffset + LOCAL_HEADER_SIZE + fileNameLength + extraFieldLength;
}

class ByteCounter extends Transform {
    bytes = 0;

    constructor(
        private readonly entry: ArchiveEntry,
        private readonly onChunk: (chunkLength: number) => void,
    ) {
        super();
    }

    override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.bytes += chunk.length;

        if (this.bytes > this.entry.size) {
            callback(
                new ExtractionError(`Entry ${this.entry.rawName} inflates beyond its declared size of ${this.entry.size} bytes`, {
                    path: this.entry.path,
                }),
            );

            return;
        }

        this.onChunk(chunk.length);
        callback(null, chunk);
    }
}

function ensureEntrySupported(entry: ArchiveEntry): void {
    if (entry.isEncrypted) {
        throw new ExtractionError(`Encrypted entries are not supported: ${entry.rawName}`, { path: entry.path });
    }

    if (entry.isSymbolicLink) {
        throw new ExtractionError(`Symbolic link entries are not supported: ${entry.rawName}`, { path: entry.path });
    }

    if (entry.compressionMethod !== COMPRESSION_STORED && entry.compressionMethod !== COMPRESSION_DEFLATE) {
        throw new ExtractionError(
            `Unsupported compression method ${entry.compressionMethod} for ${entry.rawName}`,
            { path: entry.path },
        );
    }
}

/**
 * Maps an entry onto the file system, rejecting names that would land outside
 * the destination. Returns `undefined` for entries with an empty name.
 */
export function resolveEntryTarget(destinationRoot: string, entry: Pick<ArchiveEntry, "path" | "rawName">): string | undefined {
    const unified = entry.rawName.replace(/\\/g, "/");

    if (unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) {
        throw new ExtractionError(`Archive entry uses an absolute path: ${entry.rawName}`, { path: entry.path });
    }

    if (!entry.path) {
        return undefined;
    }

    if (entry.path.split("/").includes("..")) {
        throw new ExtractionError(`Archive entry attempts to navigate outside the destination: ${entry.rawName}`, {
            path: entry.path,
        });
    }

    const absolute = path.resolve(destinationRoot, ...entry.path.split("/"));
    const rootWithSeparator = destinationRoot.endsWith(path.sep) ? destinationRoot : `${destinationRoot}${path.sep}`;

    if (!absolute.startsWith(rootWithSeparator)) {
        throw new ExtractionError(`Archive entry escapes the destination directory: ${entry.rawName}`, {
            path: entry.path,
        });
    }

    return absolute;
}

export function normalizeEntryPath(rawName: string): string {
    return rawName
        .replace(/\\/g, "/")
        .split("/")
        .filter((segment) => segment !== "" && segment !== ".")
        .join("/");
}

function detectDirectory(fileName: string, externalAttributes: number): boolean {
    if (fileName.endsWith("/") || fileName.endsWith("\\")) {
        return true;
    }

    const fileType = (externalAttributes >>> 16) & 0o170000;

    return fileType === 0o040000 || (externalAttributes & 0x10) !== 0;
}

function normalizeFileMode(mode: number): number | undefined {
    const normalized = mode & 0o777;

    return normalized === 0 ? undefined : normalized;
}

async function readExactly(handle: FileHandle, position: number, length: number): Promise<Buffer | undefined> {
    const buffer = Buffer.alloc(length);

    if (length === 0) {
        return buffer;
    }

    const { bytesRead } = await handle.read(buffer, 0, length, position);

    return bytesRead === length ? buffer : undefined;
}

function readUInt64(buffer: Buffer, offset: number): number {
    const low = buffer.readUInt32LE(offset);
    const high = buffer.readUInt32LE(offset + 4);

    return high * 0x1_0000_0000 + low;
}
