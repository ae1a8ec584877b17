import { promises as nodeFs, type Stats } from "node:fs";

import { DeletionError, OperatorCancelledError, describeError } from "../../shared/errors";
import { formatBytes } from "../../shared/format";
import type { Logger } from "../../shared/logger";
import type { ExecutionMode } from "../fsLayout";
import type { OperatorChannel } from "../operator";
import { INDICATOR_DESCRIPTIONS, type OutcomeEvaluation } from "../outcomeEvaluator";

export type GateDecision = "deleted" | "declined" | "cancelled" | "not-offered" | "simulated" | "deletion-failed";

export interface ResolveDeletionOptions {
    readonly archivePath: string;
    readonly archiveSize: number;
    readonly extractionDirectory: string;
    readonly mode: ExecutionMode;
    readonly evaluation: Pick<OutcomeEvaluation, "success" | "failedIndicators">;
    readonly channel: OperatorChannel;
    readonly logger: Logger;
    readonly fs?: Pick<typeof nodeFs, "lstat" | "unlink">;
}

export interface GateResolution {
    readonly decision: GateDecision;
    readonly error?: DeletionError | OperatorCancelledError;
}

/**
 * The only place an archive can be removed. Test mode never deletes, and
 * production deletes only after every indicator holds and the operator said yes.
 */
export async function resolveDeletion(options: ResolveDeletionOptions): Promise<GateResolution> {
    const { archivePath, channel, evaluation, logger } = options;

    if (!evaluation.success) {
        const prefix = options.mode === "test" ? "[test] Deletion would not be offered" : "Deletion not offered";
        channel.printLine(`${prefix} for ${archivePath}:`);

        for (const indicator of evaluation.failedIndicators) {
            channel.printLine(`  - ${INDICATOR_DESCRIPTIONS[indicator]}`);
        }

        logger.info("Deletion not offered", { archivePath, failedIndicators: evaluation.failedIndicators });

        return { decision: "not-offered" };
    }

    if (options.mode === "test") {
        channel.printLine(`[test] Would offer to delete ${archivePath} (${formatBytes(options.archiveSize)})`);
        channel.printLine(`[test] Extracted files would remain in ${options.extractionDirectory}`);
        logger.info("Deletion simulated", { archivePath });

        return { decision: "simulated" };
    }

    channel.printLine("All checks passed.");
    channel.printLine(`  Will be deleted: ${archivePath} (${formatBytes(options.archiveSize)})`);
    channel.printLine(`  Will remain:     ${options.extractionDirectory}`);

    let confirmed: boolean;

    try {
        confirmed = await channel.confirm(`Delete ${archivePath}?`);
    } catch (error) {
        if (error instanceof OperatorCancelledError) {
            channel.printLine(`Deletion cancelled; kept ${archivePath}`);
            logger.warn("Deletion prompt interrupted", { archivePath });

            return { decision: "cancelled", error };
        }

        throw error;
    }

    if (!confirmed) {
        channel.printLine(`Kept ${archivePath}`);
        logger.info("Deletion declined", { archivePath });

        return { decision: "declined" };
    }

    try {
        await deleteArchiveSafely(archivePath, { fs: options.fs });
    } catch (error) {
        if (error instanceof DeletionError) {
            channel.printLine(error.message);
            logger.error("Archive deletion failed", { archivePath, error: error.message });

            return { decision: "deletion-failed", error };
        }

        throw error;
    }

    channel.printLine(`Deleted ${archivePath}`);
    logger.info("Archive deleted", { archivePath });

    return { decision: "deleted" };
}

export interface DeleteArchiveOptions {
    readonly fs?: Pick<typeof nodeFs, "lstat" | "unlink">;
}

/** Removes `archivePath` only if it is still a regular file; never follows links. */
export async function deleteArchiveSafely(archivePath: string, options: DeleteArchiveOptions = {}): Promise<void> {
    const fsAdapter = options.fs ?? nodeFs;
    let stats: Stats;

    try {
        stats = await fsAdapter.lstat(archivePath);
    } catch (error) {
        throw new DeletionError(archivePath, `unable to inspect it (${describeError(error)})`, error);
    }

    if (stats.isSymbolicLink()) {
        throw new DeletionError(archivePath, "it is a symbolic link");
    }

    if (!stats.isFile()) {
        throw new DeletionError(archivePath, "it is not a regular file");
    }

    try {
        await fsAdapter.unlink(archivePath);
    } catch (error) {
        throw new DeletionError(archivePath, `unlink failed (${describeError(error)})`, error);
    }
}
