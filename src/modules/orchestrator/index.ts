import * as path from "node:path";

import {
    AnalysisError,
    ExtractionError,
    InvalidArchiveError,
    classifyError,
    describeError,
    type ClassifiedError,
} from "../../shared/errors";
import { formatDuration } from "../../shared/format";
import { createLogger, type Logger } from "../../shared/logger";
import { err, fromPromise, mapError, ok, partition, type Result } from "../../shared/result";
import { extractArchive, readArchiveEntries, type ExtractionResult } from "../archiveReader";
import { DEFAULT_SETTINGS, type UnzippySettings } from "../config";
import { analyzeExtractedContent, type AnalysisSummary } from "../contentAnalyzer";
import { resolveDeletion, type GateDecision } from "../deletionGate";
import {
    prepareArchiveLayout,
    removeIsolatedOutput,
    resolveArchiveLayout,
    type ExecutionMode,
} from "../fsLayout";
import { reconcileChecksums, type ReconciliationReport } from "../integrityReconciler";
import type { OperatorChannel } from "../operator";
import { evaluateOutcome, type OutcomeEvaluation } from "../outcomeEvaluator";
import { presentChecksums, presentRunTotals, presentSummary } from "../presenter";
import { createReporter, serializeError, type Reporter, type StepMetadata } from "../reporting";

export interface PipelineDependencies {
    readonly readArchiveEntries: typeof readArchiveEntries;
    readonly extractArchive: typeof extractArchive;
    readonly analyzeExtractedContent: typeof analyzeExtractedContent;
    readonly reconcileChecksums: typeof reconcileChecksums;
    readonly evaluateOutcome: typeof evaluateOutcome;
    readonly resolveDeletion: typeof resolveDeletion;
    readonly prepareArchiveLayout: typeof prepareArchiveLayout;
    readonly removeIsolatedOutput: typeof removeIsolatedOutput;
    readonly createReporter: typeof createReporter;
}

export interface OrchestratorOptions {
    readonly mode: ExecutionMode;
    readonly targetRoot: string;
    readonly channel: OperatorChannel;
    readonly settings?: UnzippySettings;
    readonly logger?: Logger;
    readonly dependencies?: Partial<PipelineDependencies>;
}

export interface ArchiveOutcome {
    readonly archivePath: string;
    readonly extractionDirectory: string;
    readonly logFile?: string;
    readonly mode: ExecutionMode;
    readonly bytesWritten: number;
    readonly summary?: AnalysisSummary;
    readonly reconciliation?: ReconciliationReport;
    readonly evaluation: OutcomeEvaluation;
    /** Errors raised during extraction, analysis and the deletion gate. */
    readonly errors: readonly ClassifiedError[];
    readonly decision: GateDecision;
}

export interface ArchiveFailure {
    readonly archivePath: string;
    readonly error: ClassifiedError;
}

export interface RunSummary {
    readonly mode: ExecutionMode;
    readonly outcomes: readonly ArchiveOutcome[];
    readonly failures: readonly ArchiveFailure[];
}

export interface ArchiveOrchestrator {
    processArchive(archivePath: string): Promise<Result<ArchiveOutcome, ClassifiedError>>;
    processArchives(archivePaths: readonly string[]): Promise<RunSummary>;
}

const defaultDependencies: PipelineDependencies = {
    readArchiveEntries,
    extractArchive,
    analyzeExtractedContent,
    reconcileChecksums,
    evaluateOutcome,
    resolveDeletion,
    prepareArchiveLayout,
    removeIsolatedOutput,
    createReporter,
};

interface StepInspection {
    readonly error?: unknown;
    readonly details?: StepMetadata["details"];
}

export function createArchiveOrchestrator(options: OrchestratorOptions): ArchiveOrchestrator {
    const logger = options.logger ?? createLogger({ name: "unzippy.orchestrator" });
    const settings = options.settings ?? DEFAULT_SETTINGS;
    const channel = options.channel;
    const mode = options.mode;
    const dependencies = { ...defaultDependencies, ...(options.dependencies ?? {}) } satisfies PipelineDependencies;

    async function processArchive(input: string): Promise<Result<ArchiveOutcome, ClassifiedError>> {
        const startedAt = Date.now();
        const archivePath = path.resolve(input);
        const layout = resolveArchiveLayout(archivePath, {
            mode,
            targetRoot: options.targetRoot,
            testDirectoryName: settings.testDirectoryName,
            archiveExtension: settings.archiveExtension,
        });
        const archiveLogger = logger.child({ defaultFields: { archivePath, mode } });
        const reporter = dependencies.createReporter({
            archivePath,
            mode,
            reportFilePath: layout.logFile,
            enabled: settings.logFileEnabled,
        });
        const errors: ClassifiedError[] = [];

        // The log file is a record of the run; failing to write it never stops the pipeline.
        const report = async <T>(action: (target: Reporter) => Promise<T>): Promise<T | undefined> => {
            try {
                return await action(reporter);
            } catch (error) {
                archiveLogger.warn("Failed to update archive log", {
                    logFile: layout.logFile,
                    error: describeError(error),
                });

                return undefined;
            }
        };

        const track = async <T>(
            name: string,
            action: () => Promise<T>,
            inspect?: (value: T) => StepInspection,
        ): Promise<T> => {
            const handle = await report((target) => target.startStep(name, { path: archivePath }));

            try {
                const value = await action();
                const inspection: StepInspection = inspect?.(value) ?? {};

                if (handle) {
                    await report((target) =>
                        inspection.error === undefined
                            ? target.endStep(handle, { details: inspection.details })
                            : target.failStep(handle, inspection.error, { details: inspection.details }),
                    );
                }

                return value;
            } catch (error) {
                if (handle) {
                    await report((target) => target.failStep(handle, error));
                }

                if (!classifyError(error)) {
                    archiveLogger.error("Unexpected failure", { step: name, error: describeError(error) });
                }

                throw error;
            }
        };

        channel.printLine(
            `${mode === "test" ? "[test] " : ""}Extracting ${archivePath} -> ${layout.extractionDirectory}`,
        );

        const extracted = await fromPromise(
            () =>
                track(
                    "extract",
                    async () => {
                        // Nothing is created or cleared for an archive that cannot be read.
                        await dependencies.readArchiveEntries(archivePath);

                        try {
                            await dependencies.prepareArchiveLayout(layout);
                        } catch (error) {
                            throw new ExtractionError(
                                `Unable to prepare ${layout.extractionDirectory}: ${describeError(error)}`,
                                { cause: error, path: layout.extractionDirectory },
                            );
                        }

                        return dependencies.extractArchive(archivePath, layout.extractionDirectory, {
                            onProgress: channel.reportProgress
                                ? (progress) => channel.reportProgress?.(progress)
                                : undefined,
                            logger: archiveLogger,
                            highWaterMark: settings.chunkSize,
                        });
                    },
                    (result) => ({
                        error: result.error,
                        details: {
                            entries: result.listing.entries.length,
                            bytesWritten: result.bytesWritten,
                            totalBytes: result.totalBytes,
                        },
                    }),
                ),
            (error) => (error instanceof InvalidArchiveError || error instanceof ExtractionError ? error : undefined),
        );

        if (!extracted.ok && extracted.error instanceof InvalidArchiveError) {
            const invalid = extracted.error;
            channel.printLine(`Skipping ${archivePath}: ${invalid.message}`);
            archiveLogger.warn("Invalid archive", { error: invalid.message });
            await report((target) =>
                target.recordOutcome({
                    success: false,
                    indicators: {},
                    failedIndicators: [],
                    decision: "not-offered",
                    totalFiles: 0,
                    totalFolders: 0,
                    totalSize: 0,
                    archiveSize: 0,
                    compressionRatio: 0,
                    matchCount: 0,
                    mismatchCount: 0,
                    errors: [serializeError(invalid)],
                }),
            );

            return err(invalid);
        }

        const extraction: ExtractionResult | undefined = extracted.ok ? extracted.value : undefined;

        if (!extracted.ok) {
            errors.push(extracted.error);
        }

        if (extraction?.error) {
            errors.push(extraction.error);
        }

        let summary: AnalysisSummary | undefined;
        let reconciliation: ReconciliationReport | undefined;

        if (extraction) {
            try {
                summary = await track(
                    "analyze",
                    () =>
                        dependencies.analyzeExtractedContent(layout.extractionDirectory, {
                            archivePath,
                            chunkSize: settings.chunkSize,
                            logger: archiveLogger,
                        }),
                    (value) => ({
                        details: {
                            totalFiles: value.totalFiles,
                            totalFolders: value.totalFolders,
                            totalSize: value.totalSize,
                        },
                    }),
                );

                const files = summary.files;
                reconciliation = await track(
                    "reconcile",
                    () =>
                        dependencies.reconcileChecksums(extraction.listing.entries, files, {
                            extractionDirectory: layout.extractionDirectory,
                            chunkSize: settings.chunkSize,
                            logger: archiveLogger,
                        }),
                    (value) => ({
                        details: { matchCount: value.matchCount, mismatchCount: value.mismatchCount },
                    }),
                );
            } catch (error) {
                if (!(error instanceof AnalysisError)) {
                    throw error;
                }

                errors.push(error);
            }
        }

        const evaluation = dependencies.evaluateOutcome({ summary, reconciliation, errors });

        if (summary) {
            presentSummary(channel, summary, evaluation.compressionRatio, settings.maxInfoLines);
        }

        if (reconciliation) {
            presentChecksums(channel, reconciliation, settings.checksumPreviewCount);
        }

        for (const error of errors) {
            channel.printLine(`Error: ${error.message}`);
        }

        const gate = await track(
            "deletion-gate",
            () =>
                dependencies.resolveDeletion({
                    archivePath,
                    archiveSize: summary?.archiveSize ?? extraction?.listing.archiveSize ?? 0,
                    extractionDirectory: layout.extractionDirectory,
                    mode,
                    evaluation,
                    channel,
                    logger: archiveLogger,
                }),
            (resolution) => ({ error: resolution.error, details: { decision: resolution.decision } }),
        );

        if (mode === "test" && settings.removeTestOutput) {
            await track("remove-test-output", async () => {
                try {
                    await dependencies.removeIsolatedOutput(layout);
                } catch (error) {
                    archiveLogger.warn("Failed to remove test output", {
                        directory: layout.extractionDirectory,
                        error: describeError(error),
                    });
                }
            });
        }

        const outcomeErrors = gate.error ? [...errors, gate.error] : errors;
        const outcome: ArchiveOutcome = {
            archivePath,
            extractionDirectory: layout.extractionDirectory,
            logFile: reporter.enabled ? layout.logFile : undefined,
            mode,
            bytesWritten: extraction?.bytesWritten ?? 0,
            summary,
            reconciliation,
            evaluation,
            errors: outcomeErrors,
            decision: gate.decision,
        };

        await report((target) =>
            target.recordOutcome({
                success: evaluation.success,
                indicators: { ...evaluation.indicators },
                failedIndicators: evaluation.failedIndicators,
                decision: gate.decision,
                totalFiles: summary?.totalFiles ?? 0,
                totalFolders: summary?.totalFolders ?? 0,
                totalSize: summary?.totalSize ?? 0,
                archiveSize: summary?.archiveSize ?? 0,
                compressionRatio: evaluation.compressionRatio,
                matchCount: reconciliation?.matchCount ?? 0,
                mismatchCount: reconciliation?.mismatchCount ?? 0,
                errors: outcomeErrors.map(serializeError),
            }),
        );

        archiveLogger.info("Processed archive", {
            decision: gate.decision,
            success: evaluation.success,
            elapsed: formatDuration(Date.now() - startedAt),
        });

        return ok(outcome);
    }

    return {
        processArchive,
        async processArchives(archivePaths) {
            const results: Result<ArchiveOutcome, ArchiveFailure>[] = [];

            for (const archivePath of archivePaths) {
                const result = await processArchive(archivePath);
                results.push(mapError(result, (error) => ({ archivePath: path.resolve(archivePath), error })));
                channel.printLine();
            }

            const { values: outcomes, errors: failures } = partition(results);

            presentRunTotals(channel, {
                processed: archivePaths.length,
                verified: outcomes.filter((outcome) => outcome.evaluation.success).length,
                deleted: outcomes.filter((outcome) => outcome.decision === "deleted").length,
                skipped: failures.length,
            });

            return { mode, outcomes, failures };
        },
    } satisfies ArchiveOrchestrator;
}

export async function processArchives(
    archivePaths: readonly string[],
    options: OrchestratorOptions,
): Promise<RunSummary> {
    const orchestrator = createArchiveOrchestrator(options);

    return orchestrator.processArchives(archivePaths);
}
