import { promises as nodeFs } from "node:fs";
import * as path from "node:path";

export type ExecutionMode = "production" | "test";

export const DEFAULT_ARCHIVE_EXTENSION = ".zip";
export const DEFAULT_TEST_DIRECTORY_NAME = "unzippy-test-output";

export interface LayoutOptions {
    readonly mode: ExecutionMode;
    readonly targetRoot: string;
    readonly testDirectoryName?: string;
    readonly archiveExtension?: string;
}

export interface ArchiveLayout {
    readonly baseName: string;
    /** Where the entries of this archive are written. */
    readonly extractionDirectory: string;
    /** Per-archive log file. */
    readonly logFile: string;
    /** Test-mode root, `undefined` in production. */
    readonly isolationRoot?: string;
}

export interface PrepareLayoutOptions {
    readonly fs?: Pick<typeof nodeFs, "mkdir" | "rm">;
}

export interface DiscoverArchivesOptions {
    readonly extension?: string;
    readonly fs?: Pick<typeof nodeFs, "readdir">;
}

export function archiveBaseName(archivePath: string, extension: string = DEFAULT_ARCHIVE_EXTENSION): string {
    const fileName = path.basename(archivePath);

    if (fileName.toLowerCase().endsWith(extension.toLowerCase()) && fileName.length > extension.length) {
        return fileName.slice(0, fileName.length - extension.length);
    }

    const parsed = path.parse(fileName);

    return parsed.name || fileName;
}

/**
 * Production writes to `<target>/<base name>` and keeps the log beside the
 * archive. Test mode moves both below `<target>/<test directory>` so test runs
 * never touch a real extraction target.
 */
export function resolveArchiveLayout(archivePath: string, options: LayoutOptions): ArchiveLayout {
    const baseName = archiveBaseName(archivePath, options.archiveExtension);
    const targetRoot = path.resolve(options.targetRoot);

    if (options.mode === "test") {
        const isolationRoot = path.join(targetRoot, options.testDirectoryName ?? DEFAULT_TEST_DIRECTORY_NAME);

        return {
            baseName,
            extractionDirectory: path.join(isolationRoot, baseName),
            logFile: path.join(isolationRoot, `${baseName}.log`),
            isolationRoot,
        };
    }

    return {
        baseName,
        extractionDirectory: path.join(targetRoot, baseName),
        logFile: path.join(path.dirname(path.resolve(archivePath)), `${baseName}.log`),
    };
}

/**
 * Creates the parent of the extraction directory. In test mode, output left
 * by an earlier test run of the same archive is removed first.
 */
export async function prepareArchiveLayout(layout: ArchiveLayout, options: PrepareLayoutOptions = {}): Promise<void> {
    const fsAdapter = options.fs ?? nodeFs;

    if (layout.isolationRoot) {
        await removeIsolatedOutput(layout, options);
    }

    await fsAdapter.mkdir(path.dirname(layout.extractionDirectory), { recursive: true });
}

export async function removeIsolatedOutput(layout: ArchiveLayout, options: PrepareLayoutOptions = {}): Promise<void> {
    const fsAdapter = options.fs ?? nodeFs;

    if (!layout.isolationRoot || !isInside(layout.isolationRoot, layout.extractionDirectory)) {
        throw new Error(`Refusing to remove ${layout.extractionDirectory}: not inside the test output directory`);
    }

    await fsAdapter.rm(layout.extractionDirectory, { recursive: true, force: true });
}

/** Regular files in `directory` whose name ends in the archive extension, sorted by name. */
export async function discoverArchives(directory: string, options: DiscoverArchivesOptions = {}): Promise<string[]> {
    const fsAdapter = options.fs ?? nodeFs;
    const extension = (options.extension ?? DEFAULT_ARCHIVE_EXTENSION).toLowerCase();
    const entries = await fsAdapter.readdir(directory, { withFileTypes: true });

    return entries
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(extension))
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(directory, name));
}

function isInside(parent: string, child: string): boolean {
    const relative = path.relative(parent, child);

    return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}
