export type ErrorKind =
    | "InvalidArchive"
    | "ExtractionError"
    | "AnalysisError"
    | "ChecksumUnavailable"
    | "DeletionError"
    | "OperatorCancelled";

interface UnzippyErrorOptions {
    readonly cause?: unknown;
    readonly path?: string;
}

export abstract class UnzippyError extends Error {
    abstract readonly kind: ErrorKind;

    readonly path?: string;

    protected constructor(message: string, options: UnzippyErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.path = options.path;
    }
}

/** The file is missing or is not a well-formed ZIP archive. */
export class InvalidArchiveError extends UnzippyError {
    readonly kind = "InvalidArchive" as const;

    constructor(archivePath: string, reason: string, cause?: unknown) {
        super(`${archivePath} is not a valid zip archive: ${reason}`, { cause, path: archivePath });
    }
}

export class ExtractionError extends UnzippyError {
    readonly kind = "ExtractionError" as const;

    constructor(message: string, options: UnzippyErrorOptions = {}) {
        super(message, options);
    }
}

export class AnalysisError extends UnzippyError {
    readonly kind = "AnalysisError" as const;

    constructor(message: string, options: UnzippyErrorOptions = {}) {
        super(message, options);
    }
}

export type ChecksumSide = "archive" | "disk";

/** A file is known on one side only, so no checksum pair exists for it. */
export class ChecksumUnavailableError extends UnzippyError {
    readonly kind = "ChecksumUnavailable" as const;

    readonly missingFrom: ChecksumSide;

    constructor(filePath: string, missingFrom: ChecksumSide) {
        super(
            missingFrom === "disk"
                ? `${filePath} is listed in the archive but was not found on disk`
                : `${filePath} was found on disk but is not listed in the archive`,
            { path: filePath },
        );
        this.missingFrom = missingFrom;
    }
}

export class DeletionError extends UnzippyError {
    readonly kind = "DeletionError" as const;

    constructor(targetPath: string, reason: string, cause?: unknown) {
        super(`Refusing to delete ${targetPath}: ${reason}`, { cause, path: targetPath });
    }
}

export class OperatorCancelledError extends UnzippyError {
    readonly kind = "OperatorCancelled" as const;

    constructor(message = "Operation cancelled by operator") {
        super(message);
    }
}

export type ClassifiedError =
    | InvalidArchiveError
    | ExtractionError
    | AnalysisError
    | ChecksumUnavailableError
    | DeletionError
    | OperatorCancelledError;

export function classifyError(error: unknown): ClassifiedError | undefined {
    if (
        error instanceof InvalidArchiveError ||
        error instanceof ExtractionError ||
        error instanceof AnalysisError ||
        error instanceof ChecksumUnavailableError ||
        error instanceof DeletionError ||
        error instanceof OperatorCancelledError
    ) {
        return error;
    }

    return undefined;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    if (typeof error === "string") {
        return error;
    }

    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

export function wrapError(message: string, error: unknown): Error {
    if (error instanceof Error) {
        return new Error(`${message}: ${error.message}`, { cause: error });
    }

    return new Error(`${message}: ${String(error)}`);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error && typeof error.code === "string";
}
