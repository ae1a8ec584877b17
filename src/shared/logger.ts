export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerContext {
    name: string;
    defaultFields?: Record<string, unknown>;
    level?: LogLevel;
    sink?: LogSink;
}

export interface Logger {
    readonly level: LogLevel;
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
    child(childContext: Partial<LoggerContext>): Logger;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function isLogLevel(value: unknown): value is LogLevel {
    return value === "debug" || value === "info" || value === "warn" || value === "error";
}

// Operator output owns stdout; structured records always go to stderr.
const stderrSink: LogSink = (_level, line) => {
    process.stderr.write(`${line}\n`);
};

function log(level: LogLevel, context: LoggerContext, message: string, fields?: Record<string, unknown>): void {
    const threshold = context.level ?? DEFAULT_LOG_LEVEL;

    if (LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[threshold]) {
        return;
    }

    const payload = {
        level,
        message,
        logger: context.name,
        ...(context.defaultFields ?? {}),
        ...(fields ?? {}),
        timestamp: new Date().toISOString(),
    };

    (context.sink ?? stderrSink)(level, JSON.stringify(payload));
}

function mergeContext(base: LoggerContext, childContext: Partial<LoggerContext>): LoggerContext {
    return {
        name: childContext.name ?? base.name,
        level: childContext.level ?? base.level,
        sink: childContext.sink ?? base.sink,
        defaultFields: {
            ...(base.defaultFields ?? {}),
            ...(childContext.defaultFields ?? {}),
        },
    };
}

export function createLogger(context: LoggerContext): Logger {
    const logWithLevel = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
        log(level, context, message, fields);
    };

    const child = (childContext: Partial<LoggerContext>): Logger => createLogger(mergeContext(context, childContext));

    return {
        level: context.level ?? DEFAULT_LOG_LEVEL,
        debug: (message, fields) => logWithLevel("debug", message, fields),
        info: (message, fields) => logWithLevel("info", message, fields),
        warn: (message, fields) => logWithLevel("warn", message, fields),
        error: (message, fields) => logWithLevel("error", message, fields),
        child,
    };
}
