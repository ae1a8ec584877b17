#!/usr/bin/env node
/**
 * unzippy
 *
 * Extracts zip archives, verifies every extracted file against the CRC-32
 * stored in the archive and offers to delete archives that checked out.
 *
 *   unzippy                  - process every *.zip in the working directory
 *   unzippy a.zip b.zip      - process the given archives
 *   unzippy --test a.zip     - isolated extraction, deletion only simulated
 */

import * as path from "node:path";

import { Command, CommanderError, InvalidArgumentError } from "commander";

import { clamp, loadConfiguration, resolveSettings, type UnzippySettings } from "./modules/config";
import { discoverArchives, type ExecutionMode } from "./modules/fsLayout";
import { createConsoleChannel, type OperatorChannel } from "./modules/operator";
import { processArchives } from "./modules/orchestrator";
import { describeError } from "./shared/errors";
import { createLogger, type LogSink } from "./shared/logger";

const VERSION = "1.0.0";

export type CliOptions = {
    readonly target?: string;
    readonly test: boolean;
    readonly maxLines?: number;
    readonly log: boolean;
    readonly config?: string;
    readonly verbose: boolean;
};

export interface CliEnvironment {
    readonly cwd?: string;
    readonly env?: NodeJS.ProcessEnv;
    readonly homeDir?: string;
    readonly channel?: OperatorChannel;
    readonly logSink?: LogSink;
    readonly writeOut?: (text: string) => void;
    readonly writeErr?: (text: string) => void;
}

function parseLineBudget(value: string): number {
    const parsed = Number.parseInt(value, 10);

    if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError("Expected a whole number.");
    }

    return parsed;
}

export function buildProgram(environment: CliEnvironment = {}): Command {
    const program = new Command();
    const writeOut = environment.writeOut ?? ((text: string) => process.stdout.write(text));
    const writeErr = environment.writeErr ?? ((text: string) => process.stderr.write(text));

    return program
        .name("unzippy")
        .description("Extract zip archives, verify their contents and delete the archives that check out")
        .version(VERSION)
        .argument("[archives...]", "archives to process (default: every archive in the working directory)")
        .option("-t, --target <dir>", "directory the archives are extracted into (default: working directory)")
        .option("--test", "extract into an isolated directory and only simulate deletion", false)
        .option("-m, --max-lines <n>", "line budget for each extraction summary", parseLineBudget)
        .option("--no-log", "do not write the per-archive log file")
        .option("-c, --config <file>", "configuration file")
        .option("-v, --verbose", "write debug logs to stderr", false)
        .exitOverride()
        .configureOutput({ writeOut, writeErr });
}

/** Resolves to the process exit code. */
export async function runCli(argv: readonly string[], environment: CliEnvironment = {}): Promise<number> {
    const program = buildProgram(environment);
    let exitCode = 0;

    program.action(async (archives: string[]) => {
        exitCode = await execute(archives, program.opts<CliOptions>(), environment);
    });

    try {
        await program.parseAsync([...argv], { from: "user" });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }

        throw error;
    }

    return exitCode;
}

async function execute(archives: readonly string[], options: CliOptions, environment: CliEnvironment): Promise<number> {
    const cwd = environment.cwd ?? process.cwd();
    const writeErr = environment.writeErr ?? ((text: string) => process.stderr.write(text));
    const bootstrapLogger = createLogger({
        name: "unzippy",
        level: options.verbose ? "debug" : undefined,
        sink: environment.logSink,
    });

    try {
        const configuration = await loadConfiguration({
            cwd,
            homeDir: environment.homeDir,
            filePath: options.config,
            env: environment.env,
        });
        const resolved = resolveSettings(configuration.reader);
        const settings = applyOverrides(resolved.settings, options);
        const logger = createLogger({
            name: "unzippy",
            level: options.verbose ? "debug" : settings.logLevel,
            sink: environment.logSink,
        });

        for (const warning of [...configuration.warnings, ...resolved.warnings]) {
            logger.warn(warning, { source: configuration.source });
        }

        const channel = environment.channel ?? createConsoleChannel();
        const archivePaths =
            archives.length > 0
                ? archives.map((archive) => path.resolve(cwd, archive))
                : await discoverArchives(cwd, { extension: settings.archiveExtension });

        if (archivePaths.length === 0) {
            channel.printLine(`No ${settings.archiveExtension} archives found in ${cwd}`);
            return 0;
        }

        const mode: ExecutionMode = options.test ? "test" : "production";
        logger.debug("Starting run", { mode, archives: archivePaths.length });

        try {
            await processArchives(archivePaths, {
                mode,
                targetRoot: path.resolve(cwd, options.target ?? "."),
                channel,
                settings,
                logger,
            });
        } finally {
            channel.close?.();
        }

        return 0;
    } catch (error) {
        bootstrapLogger.error("Run aborted", { error: describeError(error) });
        writeErr(`unzippy: ${describeError(error)}\n`);

        return 1;
    }
}

export function applyOverrides(settings: UnzippySettings, options: CliOptions): UnzippySettings {
    return {
        ...settings,
        maxInfoLines:
            options.maxLines === undefined ? settings.maxInfoLines : clamp(options.maxLines, { min: 6, max: 1_000 }),
        logFileEnabled: settings.logFileEnabled && options.log,
    };
}

if (require.main === module) {
    runCli(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            process.stderr.write(`unzippy: ${describeError(error)}\n`);
            process.exitCode = 1;
        },
    );
}
