import { promises as fsPromises } from "node:fs";

import signatureTable from "./signatures.json";

export const DEFAULT_SNIFF_WINDOW = 4_096;

export const EMPTY_CONTENT_TYPE = "application/x-empty";
export const BINARY_CONTENT_TYPE = "application/octet-stream";
export const TEXT_CONTENT_TYPE = "text/plain";
export const JSON_CONTENT_TYPE = "application/json";

interface BytePattern {
    readonly offset: number;
    readonly bytes: Buffer;
}

interface BinarySignature {
    readonly mime: string;
    readonly patterns: readonly BytePattern[];
}

interface TextSignature {
    readonly mime: string;
    readonly prefix: string;
    readonly caseInsensitive: boolean;
}

export interface SniffOptions {
    readonly windowSize?: number;
}

export interface SniffInput {
    readonly bytes: Uint8Array;
    /** True when `bytes` holds the whole file rather than its first window. */
    readonly complete: boolean;
}

const BINARY_SIGNATURES: readonly BinarySignature[] = signatureTable.binary.map((signature) => ({
    mime: signature.mime,
    patterns: signature.patterns.map((pattern) => ({
        offset: pattern.offset,
        bytes: Buffer.from(pattern.hex, "hex"),
    })),
}));

const TEXT_SIGNATURES: readonly TextSignature[] = signatureTable.text;

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/**
 * Classifies a file by its leading bytes. The file name is never looked at.
 */
export async function sniffContentType(filePath: string, options: SniffOptions = {}): Promise<string> {
    const windowSize = options.windowSize ?? DEFAULT_SNIFF_WINDOW;
    const handle = await fsPromises.open(filePath, "r");

    try {
        const buffer = Buffer.alloc(windowSize);
        const { bytesRead } = await handle.read(buffer, 0, windowSize, 0);
        const { size } = await handle.stat();

        return sniffBytes({ bytes: buffer.subarray(0, bytesRead), complete: bytesRead >= size });
    } finally {
        await handle.close();
    }
}

export function sniffBytes(input: SniffInput): string {
    const bytes = Buffer.from(input.bytes.buffer, input.bytes.byteOffset, input.bytes.byteLength);

    if (bytes.length === 0) {
        return EMPTY_CONTENT_TYPE;
    }

    const binaryMatch = BINARY_SIGNATURES.find((signature) =>
        signature.patterns.every((pattern) => matchesAt(bytes, pattern)),
    );

    if (binaryMatch) {
        return binaryMatch.mime;
    }

    const text = decodeText(bytes, input.complete);

    if (text === undefined) {
        return BINARY_CONTENT_TYPE;
    }

    return classifyText(text, input.complete);
}

function matchesAt(bytes: Buffer, pattern: BytePattern): boolean {
    const end = pattern.offset + pattern.bytes.length;

    if (end > bytes.length) {
        return false;
    }

    return bytes.subarray(pattern.offset, end).equals(pattern.bytes);
}

function decodeText(bytes: Buffer, complete: boolean): string | undefined {
    if (bytes.includes(0)) {
        return undefined;
    }

    const content = bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? bytes.subarray(UTF8_BOM.length) : bytes;

    try {
        // A partial window may end inside a multi-byte sequence; stream mode keeps that from failing.
        return new TextDecoder("utf-8", { fatal: true }).decode(content, { stream: !complete });
    } catch {
        return undefined;
    }
}

function classifyText(text: string, complete: boolean): string {
    const trimmed = text.trimStart();
    const lowered = trimmed.toLowerCase();

    const prefixMatch = TEXT_SIGNATURES.find((signature) =>
        signature.caseInsensitive
            ? lowered.startsWith(signature.prefix.toLowerCase())
            : trimmed.startsWith(signature.prefix),
    );

    if (prefixMatch) {
        return prefixMatch.mime;
    }

    if (complete && (trimmed.startsWith("{") || trimmed.startsWith("[")) && isJson(trimmed)) {
        return JSON_CONTENT_TYPE;
    }

    return TEXT_CONTENT_TYPE;
}

function isJson(text: string): boolean {
    try {
        JSON.parse(text);

        return true;
    } catch {
        return false;
    }
}
