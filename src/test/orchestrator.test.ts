import { strict as assert } from "node:assert";
import { promises as fs } from "node:fs";
import * as path from "node:path";

import { DEFAULT_SETTINGS, type UnzippySettings } from "../modules/config";
import { analyzeExtractedContent } from "../modules/contentAnalyzer";
import type { ExecutionMode } from "../modules/fsLayout";
import {
    createArchiveOrchestrator,
    type ArchiveOutcome,
    type OrchestratorOptions,
    type PipelineDependencies,
} from "../modules/orchestrator";
import type { ExecutionReport } from "../modules/reporting";
import { ExtractionError, InvalidArchiveError, OperatorCancelledError } from "../shared/errors";
import type { Result } from "../shared/result";
import { MemoryChannel } from "./helpers/memoryChannel";
import { createSilentLogger } from "./helpers/silentLogger";
import { createTempDirectory, sampleEntries, writeZipArchive } from "./helpers/zipFixtures";

function expectOutcome<E>(result: Result<ArchiveOutcome, E>): ArchiveOutcome {
    if (!result.ok) {
        throw new Error(`Expected an outcome, received ${String(result.error)}`);
    }

    return result.value;
}

async function exists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

async function readLog(target: string): Promise<ExecutionReport> {
    const parsed: ExecutionReport = JSON.parse(await fs.readFile(target, "utf8"));
    return parsed;
}

suite("orchestrator", () => {
    let tempDir: string;
    let targetRoot: string;
    let archivePath: string;

    setup(async () => {
        tempDir = await createTempDirectory("unzippy-orchestrator-");
        targetRoot = path.join(tempDir, "out");
        archivePath = path.join(tempDir, "sample.zip");
        await writeZipArchive(archivePath, sampleEntries());
    });

    teardown(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function createOrchestrator(
        channel: MemoryChannel,
        mode: ExecutionMode,
        overrides: {
            settings?: Partial<UnzippySettings>;
            dependencies?: Partial<PipelineDependencies>;
        } = {},
    ) {
        const options: OrchestratorOptions = {
            mode,
            targetRoot,
            channel,
            settings: { ...DEFAULT_SETTINGS, ...(overrides.settings ?? {}) },
            logger: createSilentLogger(),
            dependencies: overrides.dependencies,
        };

        return createArchiveOrchestrator(options);
    }

    test("extracts, verifies and deletes a confirmed archive in production", async () => {
        const channel = new MemoryChannel(["yes"]);
        const orchestrator = createOrchestrator(channel, "production");

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));
        const extractionDirectory = path.join(targetRoot, "sample");

        assert.equal(outcome.extractionDirectory, extractionDirectory);
        assert.equal(outcome.bytesWritten, 150);
        assert.equal(outcome.summary?.totalFiles, 3);
        assert.equal(outcome.summary?.totalFolders, 1);
        assert.equal(outcome.summary?.totalSize, 150);
        assert.deepEqual(outcome.summary?.largestFile, { path: "a.txt", size: 100 });
        assert.equal(outcome.reconciliation?.matchCount, 3);
        assert.equal(outcome.reconciliation?.mismatchCount, 0);
        assert.equal(outcome.evaluation.success, true);
        assert.deepEqual(outcome.errors, []);
        assert.equal(outcome.decision, "deleted");

        assert.equal(channel.lines[0], `Extracting ${archivePath} -> ${extractionDirectory}`);
        assert.ok(channel.lines.includes("Files:        3"));
        assert.ok(channel.lines.includes("All 3 checksums match."));
        assert.ok(channel.lines.includes(`Deleted ${archivePath}`));
        assert.deepEqual(channel.questions, [`Delete ${archivePath}?`]);

        assert.equal(await exists(archivePath), false);
        assert.equal(await fs.readFile(path.join(extractionDirectory, "dir", "c.txt"), "utf8"), "c".repeat(50));
    });

    test("reports extraction progress to the channel", async () => {
        const channel = new MemoryChannel(["no"]);
        const orchestrator = createOrchestrator(channel, "production");

        await orchestrator.processArchive(archivePath);

        const last = channel.progress[channel.progress.length - 1];
        assert.equal(last?.bytesWritten, 150);
        assert.equal(last?.totalBytes, 150);
    });

    test("keeps the archive when the operator declines", async () => {
        const channel = new MemoryChannel(["n"]);
        const orchestrator = createOrchestrator(channel, "production");

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(outcome.decision, "declined");
        assert.ok(channel.lines.includes(`Kept ${archivePath}`));
        assert.equal(await exists(archivePath), true);
    });

    test("keeps the archive when the prompt is interrupted", async () => {
        const channel = new MemoryChannel([new OperatorCancelledError()]);
        const orchestrator = createOrchestrator(channel, "production");

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(outcome.decision, "cancelled");
        assert.ok(outcome.errors[outcome.errors.length - 1] instanceof OperatorCancelledError);
        assert.equal(await exists(archivePath), true);
    });

    test("writes the archive log beside the archive", async () => {
        const channel = new MemoryChannel(["no"]);
        const orchestrator = createOrchestrator(channel, "production");

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));
        const logFile = path.join(tempDir, "sample.log");

        assert.equal(outcome.logFile, logFile);

        const report = await readLog(logFile);
        assert.equal(report.archivePath, archivePath);
        assert.equal(report.mode, "production");
        assert.deepEqual(
            report.steps.map((step) => step.name),
            ["extract", "analyze", "reconcile", "deletion-gate"],
        );
        assert.ok(report.steps.every((step) => step.status === "success"));
        assert.equal(report.outcome?.decision, "declined");
        assert.equal(report.outcome?.matchCount, 3);
        assert.equal(report.outcome?.totalFiles, 3);
    });

    test("skips the archive log when it is disabled", async () => {
        const channel = new MemoryChannel(["no"]);
        const orchestrator = createOrchestrator(channel, "production", { settings: { logFileEnabled: false } });

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(outcome.logFile, undefined);
        assert.equal(await exists(path.join(tempDir, "sample.log")), false);
    });

    test("never prompts or deletes in test mode", async () => {
        const channel = new MemoryChannel(["yes"]);
        const orchestrator = createOrchestrator(channel, "test");

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));
        const isolationRoot = path.join(targetRoot, "unzippy-test-output");
        const extractionDirectory = path.join(isolationRoot, "sample");

        assert.equal(outcome.decision, "simulated");
        assert.equal(outcome.extractionDirectory, extractionDirectory);
        assert.deepEqual(channel.questions, []);
        assert.equal(channel.lines[0], `[test] Extracting ${archivePath} -> ${extractionDirectory}`);
        assert.ok(channel.lines.includes(`[test] Extracted files would remain in ${extractionDirectory}`));
        assert.equal(await exists(archivePath), true);
        assert.equal(await exists(path.join(extractionDirectory, "a.txt")), true);
        assert.equal(await exists(path.join(isolationRoot, "sample.log")), true);
        assert.equal(await exists(path.join(tempDir, "sample.log")), false);
    });

    test("clears output from an earlier test run", async () => {
        const stale = path.join(targetRoot, "unzippy-test-output", "sample", "stale.txt");
        await fs.mkdir(path.dirname(stale), { recursive: true });
        await fs.writeFile(stale, "left over");

        const orchestrator = createOrchestrator(new MemoryChannel(), "test");
        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(await exists(stale), false);
        assert.equal(outcome.summary?.totalFiles, 3);
        assert.equal(outcome.evaluation.success, true);
    });

    test("removes test output when configured", async () => {
        const orchestrator = createOrchestrator(new MemoryChannel(), "test", {
            settings: { removeTestOutput: true },
        });

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(outcome.decision, "simulated");
        assert.equal(await exists(outcome.extractionDirectory), false);
    });

    test("withholds deletion when an extracted file no longer matches", async () => {
        const channel = new MemoryChannel(["yes"]);
        const orchestrator = createOrchestrator(channel, "production", {
            dependencies: {
                analyzeExtractedContent: async (directory, options) => {
                    const summary = await analyzeExtractedContent(directory, options);
                    await fs.writeFile(path.join(directory, "a.txt"), "changed");
                    return summary;
                },
            },
        });

        const outcome = expectOutcome(await orchestrator.processArchive(archivePath));

        assert.equal(outcome.reconciliation?.mismatchCount, 1);
        assert.deepEqual(outcome.evaluation.failedIndicators, ["checksumsVerified"]);
        assert.equal(outcome.decision, "not-offered");
        assert.deepEqual(channel.questions, []);
        assert.ok(channel.lines.includes("1 of 3 checksums do not match:"));
        assert.ok(channel.lines.includes(`Deletion not offered for ${archivePath}:`));
        assert.ok(channel.lines.includes("  - checksums do not match the archive"));
        assert.equal(await exists(archivePath), true);
    });

    test("never offers to delete an archive without files", async () => {
        const foldersOnly = path.join(tempDir, "folders.zip");
        await writeZipArchive(foldersOnly, [{ name: "empty/", isDirectory: true }]);

        for (const mode of ["production", "test"] as const) {
            const channel = new MemoryChannel(["yes"]);
            const outcome = expectOutcome(await createOrchestrator(channel, mode).processArchive(foldersOnly));

            assert.equal(outcome.summary?.totalFiles, 0);
            assert.equal(outcome.summary?.totalFolders, 1);
            assert.deepEqual(outcome.evaluation.failedIndicators, ["filesExtracted"]);
            assert.equal(outcome.decision, "not-offered");
            assert.deepEqual(channel.questions, []);
        }

        assert.equal(await exists(foldersOnly), true);
    });

    test("analyzes partial output when extraction stops", async () => {
        const unsafeArchive = path.join(tempDir, "unsafe.zip");
        await writeZipArchive(unsafeArchive, [
            { name: "ok.txt", data: Buffer.from("fine") },
            { name: "../evil.txt", data: Buffer.from("nope") },
        ]);

        const channel = new MemoryChannel(["yes"]);
        const orchestrator = createOrchestrator(channel, "production");

        const outcome = expectOutcome(await orchestrator.processArchive(unsafeArchive));

        assert.equal(outcome.errors.length, 1);
        assert.ok(outcome.errors[0] instanceof ExtractionError);
        assert.equal(outcome.summary?.totalFiles, 1);
        assert.equal(outcome.reconciliation?.matchCount, 1);
        assert.equal(outcome.reconciliation?.records[0]?.status, "missing-on-disk");
        assert.deepEqual(outcome.evaluation.failedIndicators, ["noErrors", "checksumsVerified"]);
        assert.equal(outcome.decision, "not-offered");
        assert.deepEqual(channel.questions, []);
        assert.equal(await exists(path.join(tempDir, "evil.txt")), false);
        assert.equal(await exists(path.join(targetRoot, "evil.txt")), false);
    });

    test("returns an invalid archive as an error", async () => {
        const emptyArchive = path.join(tempDir, "empty.zip");
        await fs.writeFile(emptyArchive, Buffer.alloc(0));

        const channel = new MemoryChannel();
        const orchestrator = createOrchestrator(channel, "production");

        const result = await orchestrator.processArchive(emptyArchive);

        assert.equal(result.ok, false);
        if (!result.ok) {
            assert.ok(result.error instanceof InvalidArchiveError);
            assert.equal(channel.lines[1], `Skipping ${emptyArchive}: ${emptyArchive} is not a valid zip archive: file is empty`);
        }
        assert.equal(await exists(emptyArchive), true);
        assert.equal(await exists(targetRoot), false);

        const report = await readLog(path.join(tempDir, "empty.log"));
        assert.equal(report.outcome?.decision, "not-offered");
        assert.equal(report.steps[0]?.status, "failed");
    });

    test("keeps earlier test output when the archive cannot be read", async () => {
        const brokenArchive = path.join(tempDir, "broken.zip");
        await fs.writeFile(brokenArchive, "not a zip");
        const earlier = path.join(targetRoot, "unzippy-test-output", "broken", "a.txt");
        await fs.mkdir(path.dirname(earlier), { recursive: true });
        await fs.writeFile(earlier, "from an earlier run");

        const result = await createOrchestrator(new MemoryChannel(), "test").processArchive(brokenArchive);

        assert.equal(result.ok, false);
        assert.equal(await fs.readFile(earlier, "utf8"), "from an earlier run");
    });

    test("continues with the next archive after an invalid one", async () => {
        const emptyArchive = path.join(tempDir, "empty.zip");
        await fs.writeFile(emptyArchive, Buffer.alloc(0));

        const channel = new MemoryChannel();
        const orchestrator = createOrchestrator(channel, "test");

        const summary = await orchestrator.processArchives([emptyArchive, archivePath]);

        assert.equal(summary.mode, "test");
        assert.deepEqual(
            summary.failures.map((failure) => failure.archivePath),
            [emptyArchive],
        );
        assert.deepEqual(
            summary.outcomes.map((outcome) => outcome.decision),
            ["simulated"],
        );
        assert.equal(
            channel.lines[channel.lines.length - 1],
            "Processed 2 archive(s): 1 verified, 0 deleted, 1 skipped.",
        );
    });

    test("propagates failures it cannot classify", async () => {
        const orchestrator = createOrchestrator(new MemoryChannel(), "production", {
            dependencies: {
                analyzeExtractedContent: async () => {
                    throw new TypeError("analysis exploded");
                },
            },
        });

        await assert.rejects(() => orchestrator.processArchive(archivePath), TypeError);

        const report = await readLog(path.join(tempDir, "sample.log"));
        assert.deepEqual(
            report.steps.map((step) => [step.name, step.status]),
            [
                ["extract", "success"],
                ["analyze", "failed"],
            ],
        );
        assert.equal(report.steps[1]?.error?.message, "analysis exploded");
        assert.equal(await exists(archivePath), true);
    });
});
