import * as assert from "assert";
import { promises as fs } from "node:fs";
import * as path from "node:path";

import { extractArchive, normalizeEntryPath, readArchiveEntries, type ExtractionProgress } from "../modules/archiveReader";
import { ExtractionError, InvalidArchiveError } from "../shared/errors";
import {
    computeCrc32,
    createTempDirectory,
    createZipArchive,
    sampleEntries,
    writeZipArchive,
    type ZipEntrySpec,
} from "./helpers/zipFixtures";

suite("archiveReader", () => {
    let tempDir: string;

    setup(async () => {
        tempDir = await createTempDirectory("unzippy-reader-");
    });

    teardown(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    test("lists central directory entries with their stored checksums", async () => {
        const archivePath = path.join(tempDir, "sample.zip");
        const archive = await writeZipArchive(archivePath, sampleEntries());

        const listing = await readArchiveEntries(archivePath);

        assert.strictEqual(listing.archiveSize, archive.length);
        assert.deepStrictEqual(
            listing.entries.map((entry) => [entry.path, entry.size, entry.compressionMethod, entry.isDirectory]),
            [
                ["a.txt", 100, 0, false],
                ["b.txt", 0, 0, false],
                ["dir", 0, 0, true],
                ["dir/c.txt", 50, 8, false],
            ],
        );
        assert.strictEqual(listing.entries[0]?.crc32, computeCrc32(Buffer.alloc(100, "a")));
        assert.strictEqual(listing.entries[1]?.crc32, 0);
    });

    test("extracts stored and deflated entries and reports cumulative progress", async () => {
        const archivePath = path.join(tempDir, "sample.zip");
        const destination = path.join(tempDir, "out");
        await writeZipArchive(archivePath, sampleEntries());
        const progress: ExtractionProgress[] = [];

        const result = await extractArchive(archivePath, destination, {
            onProgress: (update) => progress.push(update),
        });

        assert.strictEqual(result.error, undefined);
        assert.strictEqual(result.bytesWritten, 150);
        assert.strictEqual(result.totalBytes, 150);
        assert.deepStrictEqual(result.extractedFiles, ["a.txt", "b.txt", "dir/c.txt"]);
        assert.strictEqual(await fs.readFile(path.join(destination, "a.txt"), "utf8"), "a".repeat(100));
        assert.strictEqual((await fs.readFile(path.join(destination, "b.txt"))).length, 0);
        assert.strictEqual(await fs.readFile(path.join(destination, "dir", "c.txt"), "utf8"), "c".repeat(50));

        const last = progress[progress.length - 1];
        assert.ok(last);
        assert.strictEqual(last.bytesWritten, 150);
        assert.strictEqual(last.totalBytes, 150);
        assert.strictEqual(last.entryPath, "dir/c.txt");
        assert.ok(progress.every((update, index) => index === 0 || update.bytesWritten >= (progress[index - 1]?.bytesWritten ?? 0)));
    });

    test("reads ZIP64 end records and extended sizes", async () => {
        const archivePath = path.join(tempDir, "large.zip");
        const destination = path.join(tempDir, "out");
        await writeZipArchive(
            archivePath,
            [
                { name: "first.bin", data: Buffer.from([1, 2, 3, 4]) },
                { name: "nested/second.txt", data: Buffer.from("second entry"), method: "deflate" },
            ],
            { zip64: true },
        );

        const result = await extractArchive(archivePath, destination);

        assert.strictEqual(result.error, undefined);
        assert.deepStrictEqual(
            result.listing.entries.map((entry) => [entry.path, entry.size]),
            [
                ["first.bin", 4],
                ["nested/second.txt", 12],
            ],
        );
        assert.strictEqual(await fs.readFile(path.join(destination, "nested", "second.txt"), "utf8"), "second entry");
    });

    test("finds the end record behind an archive comment", async () => {
        const archivePath = path.join(tempDir, "comment.zip");
        await writeZipArchive(archivePath, [{ name: "a.txt", data: Buffer.from("abc") }], {
            comment: "packed for the test suite",
        });

        const listing = await readArchiveEntries(archivePath);

        assert.deepStrictEqual(
            listing.entries.map((entry) => entry.path),
            ["a.txt"],
        );
    });

    test("rejects an empty file as an invalid archive", async () => {
        const archivePath = path.join(tempDir, "empty.zip");
        await fs.writeFile(archivePath, Buffer.alloc(0));

        await assert.rejects(
            () => extractArchive(archivePath, path.join(tempDir, "out")),
            (error: unknown) => {
                assert.ok(error instanceof InvalidArchiveError);
                assert.strictEqual(error.kind, "InvalidArchive");
                assert.strictEqual(error.message, `${archivePath} is not a valid zip archive: file is empty`);
                return true;
            },
        );
    });

    test("rejects a truncated archive without writing anything", async () => {
        const archivePath = path.join(tempDir, "truncated.zip");
        const destination = path.join(tempDir, "out");
        const archive = createZipArchive(sampleEntries());
        await fs.writeFile(archivePath, archive.subarray(0, archive.length - 10));

        await assert.rejects(
            () => extractArchive(archivePath, destination),
            /end of central directory record not found/,
        );
        await assert.rejects(() => fs.access(destination));
    });

    test("rejects missing files and directories", async () => {
        await assert.rejects(() => readArchiveEntries(path.join(tempDir, "missing.zip")), /file does not exist/);
        await assert.rejects(() => readArchiveEntries(tempDir), /not a regular file/);
    });

    test("rejects a central directory entry with a bad signature", async () => {
        const archivePath = path.join(tempDir, "corrupt.zip");
        const archive = createZipArchive([{ name: "a.txt", data: Buffer.from("abc") }]);
        // 30-byte local header + 5-byte name + 3 bytes of data.
        archive.writeUInt32LE(0x12345678, 38);
        await fs.writeFile(archivePath, archive);

        await assert.rejects(() => readArchiveEntries(archivePath), /invalid central directory signature/);
    });

    test("rejects a central directory that runs past the end of the file", async () => {
        const archivePath = path.join(tempDir, "overflow.zip");
        const archive = createZipArchive([{ name: "a.txt", data: Buffer.from("abc") }]);
        archive.writeUInt32LE(0x00ffffff, archive.length - 22 + 16);
        await fs.writeFile(archivePath, archive);

        await assert.rejects(() => readArchiveEntries(archivePath), /central directory extends beyond the end of the file/);
    });

    test("stops at a path traversal entry and keeps what was written", async () => {
        const archivePath = path.join(tempDir, "traversal.zip");
        const destination = path.join(tempDir, "out");
        await writeZipArchive(archivePath, [
            { name: "ok.txt", data: Buffer.from("fine") },
            { name: "../evil.txt", data: Buffer.from("nope") },
        ]);

        const result = await extractArchive(archivePath, destination);

        assert.ok(result.error instanceof ExtractionError);
        assert.match(result.error.message, /attempts to navigate outside the destination: \.\.\/evil\.txt/);
        assert.deepStrictEqual(result.extractedFiles, ["ok.txt"]);
        await assert.rejects(() => fs.access(path.join(tempDir, "evil.txt")));
    });

    test("rejects absolute entry names", async () => {
        const archivePath = path.join(tempDir, "absolute.zip");
        await writeZipArchive(archivePath, [{ name: "/etc/unzippy.txt", data: Buffer.from("x") }]);

        const result = await extractArchive(archivePath, path.join(tempDir, "out"));

        assert.ok(result.error instanceof ExtractionError);
        assert.match(result.error.message, /uses an absolute path/);
        assert.deepStrictEqual(result.extractedFiles, []);
    });

    test("rejects unsupported methods, encryption and symbolic links", async () => {
        const cases: [string, ZipEntrySpec, RegExp][] = [
            ["method.zip", { name: "a.bin", data: Buffer.from("x"), compressionMethod: 12 }, /Unsupported compression method 12/],
            ["encrypted.zip", { name: "a.bin", data: Buffer.from("x"), generalPurposeFlag: 1 }, /Encrypted entries are not supported/],
            [
                "link.zip",
                { name: "link", data: Buffer.from("../escape"), externalAttributes: (0o120000 << 16) >>> 0 },
                /Symbolic link entries are not supported/,
            ],
        ];

        for (const [fileName, entry, expected] of cases) {
            const archivePath = path.join(tempDir, fileName);
            await writeZipArchive(archivePath, [entry]);

            const result = await extractArchive(archivePath, path.join(tempDir, `out-${fileName}`));

            assert.ok(result.error instanceof ExtractionError, fileName);
            assert.match(result.error.message, expected);
        }
    });

    test("does not verify checksums while extracting", async () => {
        const archivePath = path.join(tempDir, "badcrc.zip");
        await writeZipArchive(archivePath, [{ name: "a.txt", data: Buffer.from("abc"), crc32: 0xdeadbeef }]);

        const result = await extractArchive(archivePath, path.join(tempDir, "out"));

        assert.strictEqual(result.error, undefined);
        assert.strictEqual(result.listing.entries[0]?.crc32, 0xdeadbeef);
    });

    test("applies stored unix permission bits", async function () {
        if (process.platform === "win32") {
            this.skip();
        }

        const archivePath = path.join(tempDir, "modes.zip");
        const destination = path.join(tempDir, "out");
        await writeZipArchive(archivePath, [
            { name: "script.sh", data: Buffer.from("#!/bin/sh\n"), externalAttributes: (0o100750 << 16) >>> 0 },
        ]);

        await extractArchive(archivePath, destination);

        const stats = await fs.stat(path.join(destination, "script.sh"));
        assert.strictEqual(stats.mode & 0o777, 0o750);
    });

    test("extracts again over read-only files from an earlier run", async function () {
        if (process.platform === "win32") {
            this.skip();
        }

        const archivePath = path.join(tempDir, "readonly.zip");
        const destination = path.join(tempDir, "out");
        const readOnly = (0o100444 << 16) >>> 0;
        await writeZipArchive(archivePath, [
            { name: "notes.txt", data: Buffer.from("keep me"), externalAttributes: readOnly },
            { name: "blank.txt", data: Buffer.alloc(0), externalAttributes: readOnly },
        ]);

        const first = await extractArchive(archivePath, destination);
        const second = await extractArchive(archivePath, destination);

        assert.strictEqual(first.error, undefined);
        assert.strictEqual(second.error, undefined);
        assert.deepStrictEqual(second.extractedFiles, ["notes.txt", "blank.txt"]);
        assert.strictEqual(await fs.readFile(path.join(destination, "notes.txt"), "utf8"), "keep me");

        const stats = await fs.stat(path.join(destination, "notes.txt"));
        assert.strictEqual(stats.mode & 0o777, 0o444);
    });

    test("normalizes separators and empty segments", () => {
        assert.strictEqual(normalizeEntryPath("a\\b\\c.txt"), "a/b/c.txt");
        assert.strictEqual(normalizeEntryPath("./x//y/"), "x/y");
        assert.strictEqual(normalizeEntryPath("../up.txt"), "../up.txt");
    });
});
