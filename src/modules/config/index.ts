import { promises as fsPromises } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";

import { describeError, isNodeError, wrapError } from "../../shared/errors";
import { DEFAULT_LOG_LEVEL, isLogLevel, type LogLevel } from "../../shared/logger";
import { DEFAULT_ARCHIVE_EXTENSION, DEFAULT_TEST_DIRECTORY_NAME } from "../fsLayout";

export const CONFIG_FILE_NAME = ".unzippyrc.json";
export const CONFIG_ENV_VARIABLE = "UNZIPPY_CONFIG";

export interface ConfigurationReader {
    get(key: string): unknown;
}

export interface UnzippySettings {
    readonly maxInfoLines: number;
    readonly checksumPreviewCount: number;
    readonly chunkSize: number;
    readonly archiveExtension: string;
    readonly testDirectoryName: string;
    readonly removeTestOutput: boolean;
    readonly logFileEnabled: boolean;
    readonly logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: UnzippySettings = {
    maxInfoLines: 40,
    checksumPreviewCount: 5,
    chunkSize: 64 * 1024,
    archiveExtension: DEFAULT_ARCHIVE_EXTENSION,
    testDirectoryName: DEFAULT_TEST_DIRECTORY_NAME,
    removeTestOutput: false,
    logFileEnabled: true,
    logLevel: DEFAULT_LOG_LEVEL,
};

export interface LoadConfigurationOptions {
    readonly cwd?: string;
    readonly homeDir?: string;
    /** Explicit file; a missing explicit file is an error. */
    readonly filePath?: string;
    readonly env?: NodeJS.ProcessEnv;
    readonly fileSystem?: Pick<typeof fsPromises, "readFile">;
}

export interface LoadedConfiguration {
    readonly reader: ConfigurationReader;
    /** File the values came from, `undefined` when no file was found. */
    readonly source?: string;
    readonly warnings: readonly string[];
}

export async function loadConfiguration(options: LoadConfigurationOptions = {}): Promise<LoadedConfiguration> {
    const fileSystem = options.fileSystem ?? fsPromises;
    const env = options.env ?? process.env;
    const explicitPath = options.filePath ?? env[CONFIG_ENV_VARIABLE];

    if (explicitPath) {
        const resolved = path.resolve(options.cwd ?? process.cwd(), explicitPath);
        let content: string;

        try {
            content = await fileSystem.readFile(resolved, "utf8");
        } catch (error) {
            throw wrapError(`Unable to read configuration file ${resolved}`, error);
        }

        return parseConfiguration(content, resolved);
    }

    const candidates = [
        path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME),
        path.join(options.homeDir ?? os.homedir(), CONFIG_FILE_NAME),
    ];

    for (const candidate of candidates) {
        let content: string;

        try {
            content = await fileSystem.readFile(candidate, "utf8");
        } catch (error) {
            if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
                continue;
            }

            return {
                reader: createConfigurationReader({}),
                warnings: [`Ignoring configuration file ${candidate}: ${describeError(error)}`],
            };
        }

        return parseConfiguration(content, candidate);
    }

    return { reader: createConfigurationReader({}), warnings: [] };
}

export function parseConfiguration(content: string, source: string): LoadedConfiguration {
    const errors: ParseError[] = [];
    const parsed: unknown = parse(content, errors, { allowTrailingComma: true });

    if (errors.length > 0) {
        const details = errors
            .map((error) => `${printParseErrorCode(error.error)} at offset ${error.offset}`)
            .join(", ");

        return {
            reader: createConfigurationReader({}),
            source,
            warnings: [`Ignoring configuration file ${source}: ${details}`],
        };
    }

    if (!isRecord(parsed)) {
        return {
            reader: createConfigurationReader({}),
            source,
            warnings: [`Ignoring configuration file ${source}: expected a JSON object`],
        };
    }

    return { reader: createConfigurationReader(flattenKeys(parsed)), source, warnings: [] };
}

/**
 * Both `{ "unzippy.chunkSize": 1024 }` and `{ "unzippy": { "chunkSize": 1024 } }`
 * are read as the key `unzippy.chunkSize`.
 */
export function createConfigurationReader(values: Record<string, unknown>): ConfigurationReader {
    const table = new Map(Object.entries(values));

    return {
        get: (key) => table.get(key),
    };
}

export interface ResolvedSettings {
    readonly settings: UnzippySettings;
    readonly warnings: readonly string[];
}

export function resolveSettings(reader: ConfigurationReader | undefined): ResolvedSettings {
    const warnings: string[] = [];

    if (!reader) {
        return { settings: DEFAULT_SETTINGS, warnings };
    }

    const testDirectoryName = readString(reader, "unzippy.test.directoryName", DEFAULT_SETTINGS.testDirectoryName);
    const logLevel = reader.get("unzippy.logLevel");
    const archiveExtension = readString(reader, "unzippy.archiveExtension", DEFAULT_SETTINGS.archiveExtension);

    if (!isSinglePathSegment(testDirectoryName)) {
        warnings.push(`unzippy.test.directoryName must be a single directory name; using ${DEFAULT_TEST_DIRECTORY_NAME}`);
    }

    if (logLevel !== undefined && !isLogLevel(logLevel)) {
        warnings.push(`unzippy.logLevel must be one of debug, info, warn, error; using ${DEFAULT_LOG_LEVEL}`);
    }

    return {
        settings: {
            maxInfoLines: readNumericSetting(reader, "unzippy.maxInfoLines", DEFAULT_SETTINGS.maxInfoLines, {
                min: 6,
                max: 1_000,
            }),
            checksumPreviewCount: readNumericSetting(
                reader,
                "unzippy.checksumPreviewCount",
                DEFAULT_SETTINGS.checksumPreviewCount,
                { min: 0, max: 1_000 },
            ),
            chunkSize: readNumericSetting(reader, "unzippy.chunkSize", DEFAULT_SETTINGS.chunkSize, {
                min: 512,
                max: 16 * 1024 * 1024,
            }),
            archiveExtension: archiveExtension.startsWith(".") ? archiveExtension : `.${archiveExtension}`,
            testDirectoryName: isSinglePathSegment(testDirectoryName)
                ? testDirectoryName
                : DEFAULT_TEST_DIRECTORY_NAME,
            removeTestOutput: readBoolean(reader, "unzippy.test.removeOutput", DEFAULT_SETTINGS.removeTestOutput),
            logFileEnabled: readBoolean(reader, "unzippy.logFile.enabled", DEFAULT_SETTINGS.logFileEnabled),
            logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_SETTINGS.logLevel,
        },
        warnings,
    };
}

export function clamp(value: number, { min, max }: { min: number; max?: number }): number {
    if (Number.isNaN(value)) {
        return min;
    }

    if (value < min) {
        return min;
    }

    if (typeof max === "number" && value > max) {
        return max;
    }

    return value;
}

function readNumericSetting(
    reader: ConfigurationReader,
    key: string,
    fallback: number,
    constraints: { min: number; max?: number },
): number {
    const raw = reader.get(key);

    if (typeof raw !== "number") {
        return fallback;
    }

    return Math.floor(clamp(raw, constraints));
}

function readString(reader: ConfigurationReader, key: string, fallback: string): string {
    const raw = reader.get(key);

    return typeof raw === "string" && raw.trim() ? raw.trim() : fallback;
}

function readBoolean(reader: ConfigurationReader, key: string, fallback: boolean): boolean {
    const raw = reader.get(key);

    return typeof raw === "boolean" ? raw : fallback;
}

function isSinglePathSegment(value: string): boolean {
    return value !== "." && value !== ".." && !/[\\/]/.test(value);
}

function flattenKeys(source: Record<string, unknown>, prefix = ""): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(source)) {
        const qualified = prefix ? `${prefix}.${key}` : key;

        if (isRecord(value)) {
            Object.assign(result, flattenKeys(value, qualified));
        } else {
            result[qualified] = value;
        }
    }

    return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
