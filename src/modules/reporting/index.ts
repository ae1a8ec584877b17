import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { ExecutionMode } from "../fsLayout";

export interface StepMetadata {
    readonly path?: string;
    readonly details?: Record<string, string | number | boolean>;
}

export interface StepHandle {
    readonly id: string;
}

type StepStatus = "in-progress" | "success" | "failed";

interface FileSystemAdapter {
    mkdir(
        target: string,
        options?: import("node:fs").MakeDirectoryOptions & { recursive?: boolean },
    ): Promise<void>;
    writeFile(target: string, contents: string): Promise<void>;
}

export interface ReporterOptions {
    readonly archivePath: string;
    readonly mode: ExecutionMode;
    readonly reportFilePath: string;
    /** When false nothing is written; the report is still kept in memory. */
    readonly enabled?: boolean;
    readonly clock?: () => Date;
    readonly idGenerator?: () => string;
    readonly fileSystem?: Partial<FileSystemAdapter>;
}

export interface SerializedError {
    readonly message: string;
    readonly name?: string;
    readonly kind?: string;
    readonly stack?: string;
}

export interface StepRecord {
    readonly id: string;
    readonly name: string;
    status: StepStatus;
    readonly startedAt: string;
    endedAt?: string;
    durationMs?: number;
    path?: string;
    details?: Record<string, string | number | boolean>;
    error?: SerializedError;
}

export interface OutcomeRecord {
    readonly success: boolean;
    readonly indicators: Readonly<Record<string, boolean>>;
    readonly failedIndicators: readonly string[];
    readonly decision: string;
    readonly totalFiles: number;
    readonly totalFolders: number;
    readonly totalSize: number;
    readonly archiveSize: number;
    readonly compressionRatio: number;
    readonly matchCount: number;
    readonly mismatchCount: number;
    readonly errors: readonly SerializedError[];
}

export interface ExecutionReport {
    readonly runId: string;
    readonly archivePath: string;
    readonly mode: ExecutionMode;
    readonly createdAt: string;
    updatedAt: string;
    steps: StepRecord[];
    outcome?: OutcomeRecord;
}

export interface Reporter {
    readonly reportFilePath: string;
    readonly enabled: boolean;
    startStep(name: string, metadata?: StepMetadata): Promise<StepHandle>;
    endStep(handle: StepHandle, metadata?: StepMetadata): Promise<void>;
    failStep(handle: StepHandle, error: unknown, metadata?: StepMetadata): Promise<void>;
    recordOutcome(outcome: OutcomeRecord): Promise<void>;
    getReport(): ExecutionReport;
}

interface ActiveStep {
    readonly startedAt: Date;
    readonly record: StepRecord;
}

class ReporterImpl implements Reporter {
    readonly reportFilePath: string;

    readonly enabled: boolean;

    private readonly activeSteps = new Map<string, ActiveStep>();

    private readonly clock: () => Date;

    private readonly idGenerator: () => string;

    private readonly fs: FileSystemAdapter;

    private readonly report: ExecutionReport;

    private directoryReady?: Promise<void>;

    private persistQueue: Promise<void> = Promise.resolve();

    constructor(options: ReporterOptions) {
        this.clock = options.clock ?? (() => new Date());
        this.idGenerator = options.idGenerator ?? (() => randomUUID());
        this.reportFilePath = options.reportFilePath;
        this.enabled = options.enabled ?? true;
        const defaultFileSystem: FileSystemAdapter = {
            mkdir: async (target, mkdirOptions) => {
                await fs.mkdir(target, mkdirOptions);
            },
            writeFile: async (target, contents) => {
                await fs.writeFile(target, contents);
            },
        };
        this.fs = {
            mkdir: options.fileSystem?.mkdir ?? defaultFileSystem.mkdir,
            writeFile: options.fileSystem?.writeFile ?? defaultFileSystem.writeFile,
        };
        const now = this.clock().toISOString();
        this.report = {
            runId: this.idGenerator(),
            archivePath: options.archivePath,
            mode: options.mode,
            createdAt: now,
            updatedAt: now,
            steps: [],
        };
    }

    async startStep(name: string, metadata: StepMetadata = {}): Promise<StepHandle> {
        const now = this.clock();
        const step: StepRecord = {
            id: this.idGenerator(),
            name,
            status: "in-progress",
            startedAt: now.toISOString(),
            path: metadata.path,
            details: metadata.details,
        };
        this.activeSteps.set(step.id, { startedAt: now, record: step });
        this.report.steps.push(step);
        await this.persist();

        return { id: step.id };
    }

    async endStep(handle: StepHandle, metadata: StepMetadata = {}): Promise<void> {
        this.finishStep(handle, "success", metadata);
        await this.persist();
    }

    async failStep(handle: StepHandle, error: unknown, metadata: StepMetadata = {}): Promise<void> {
        const step = this.finishStep(handle, "failed", metadata);
        step.error = serializeError(error);
        await this.persist();
    }

    async recordOutcome(outcome: OutcomeRecord): Promise<void> {
        this.report.outcome = outcome;
        await this.persist();
    }

    getReport(): ExecutionReport {
        return structuredClone(this.report);
    }

    private finishStep(handle: StepHandle, status: StepStatus, metadata: StepMetadata): StepRecord {
        const active = this.activeSteps.get(handle.id);

        if (!active) {
            throw new Error(`Step with id "${handle.id}" is not active.`);
        }

        const now = this.clock();
        const step = active.record;
        step.status = status;
        step.endedAt = now.toISOString();
        step.durationMs = Math.max(0, now.getTime() - active.startedAt.getTime());

        if (metadata.path !== undefined) {
            step.path = metadata.path;
        }

        if (metadata.details !== undefined) {
            step.details = { ...(step.details ?? {}), ...metadata.details };
        }

        this.activeSteps.delete(handle.id);

        return step;
    }

    private async persist(): Promise<void> {
        this.report.updatedAt = this.clock().toISOString();

        if (!this.enabled) {
            return;
        }

        const writeReport = async () => {
            await this.ensureDirectory();
            await this.fs.writeFile(this.reportFilePath, `${JSON.stringify(this.report, null, 2)}\n`);
        };

        const next = this.persistQueue.then(writeReport, writeReport);
        this.persistQueue = next.then(
            () => undefined,
            () => undefined,
        );
        await next;
    }

    private async ensureDirectory(): Promise<void> {
        if (!this.directoryReady) {
            this.directoryReady = this.fs.mkdir(path.dirname(this.reportFilePath), { recursive: true });
        }

        await this.directoryReady;
    }
}

export function serializeError(error: unknown): SerializedError {
    if (error instanceof Error) {
        const kind = "kind" in error && typeof error.kind === "string" ? error.kind : undefined;

        return {
            message: error.message,
            name: error.name,
            kind,
            stack: error.stack,
        };
    }

    if (typeof error === "string") {
        return { message: error };
    }

    return { message: safeStringify(error) };
}

function safeStringify(value: unknown): string {
    try {
        const stringified = JSON.stringify(value, undefined, 2);

        if (typeof stringified === "string") {
            return stringified;
        }
    } catch (error) {
        return `Unable to serialize value: ${String(error)}`;
    }

    return String(value);
}

export function createReporter(options: ReporterOptions): Reporter {
    return new ReporterImpl(options);
}
