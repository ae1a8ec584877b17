import type { ClassifiedError } from "../../shared/errors";
import type { AnalysisSummary } from "../contentAnalyzer";
import type { ReconciliationReport } from "../integrityReconciler";

export interface SuccessIndicators {
    readonly filesExtracted: boolean;
    readonly noErrors: boolean;
    readonly checksumsVerified: boolean;
}

export type IndicatorName = keyof SuccessIndicators;

export interface OutcomeEvaluation {
    readonly indicators: SuccessIndicators;
    readonly success: boolean;
    readonly failedIndicators: readonly IndicatorName[];
    /** Archive size divided by extracted size; informational only. */
    readonly compressionRatio: number;
}

export interface EvaluateOutcomeInput {
    readonly summary: Pick<AnalysisSummary, "totalFiles" | "totalSize" | "archiveSize"> | undefined;
    readonly reconciliation: Pick<ReconciliationReport, "mismatchCount"> | undefined;
    readonly errors: readonly ClassifiedError[];
}

const INDICATOR_NAMES: readonly IndicatorName[] = ["filesExtracted", "noErrors", "checksumsVerified"];

export const INDICATOR_DESCRIPTIONS: Record<IndicatorName, string> = {
    filesExtracted: "no files were extracted",
    noErrors: "errors occurred during extraction or analysis",
    checksumsVerified: "checksums do not match the archive",
};

/**
 * Deletion is offered only when every indicator holds. A missing summary or
 * reconciliation (the stage failed) counts against the indicators.
 */
export function evaluateOutcome(input: EvaluateOutcomeInput): OutcomeEvaluation {
    const totalFiles = input.summary?.totalFiles ?? 0;
    const indicators: SuccessIndicators = {
        filesExtracted: totalFiles > 0,
        noErrors: input.errors.length === 0,
        checksumsVerified: input.reconciliation !== undefined && input.reconciliation.mismatchCount === 0,
    };
    const failedIndicators = INDICATOR_NAMES.filter((name) => !indicators[name]);

    return {
        indicators,
        success: failedIndicators.length === 0,
        failedIndicators,
        compressionRatio: computeCompressionRatio(input.summary?.archiveSize ?? 0, input.summary?.totalSize ?? 0),
    };
}

export function computeCompressionRatio(archiveSize: number, totalSize: number): number {
    return totalSize > 0 ? archiveSize / totalSize : 0;
}
