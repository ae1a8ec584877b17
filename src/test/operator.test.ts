import * as assert from "assert";
import { PassThrough } from "node:stream";

import { createConsoleChannel, isAffirmative, renderTable } from "../modules/operator";
import { OperatorCancelledError } from "../shared/errors";

/** Everything written to the stream so far; nothing else reads from it. */
function collect(stream: PassThrough): () => string {
    return () => {
        const chunk: unknown = stream.read();

        return chunk instanceof Buffer ? chunk.toString("utf8") : "";
    };
}

suite("operator", () => {
    test("accepts only y and yes as confirmation", () => {
        assert.strictEqual(isAffirmative("y"), true);
        assert.strictEqual(isAffirmative(" YES "), true);
        assert.strictEqual(isAffirmative("Yes"), true);
        assert.strictEqual(isAffirmative(""), false);
        assert.strictEqual(isAffirmative("no"), false);
        assert.strictEqual(isAffirmative("yep"), false);
    });

    test("renders left-aligned bordered tables", () => {
        assert.deepStrictEqual(
            renderTable(
                ["Content type", "Files"],
                [
                    ["text/plain", "2"],
                    ["image/png", "10"],
                ],
            ),
            [
                "+--------------+-------+",
                "| Content type | Files |",
                "+--------------+-------+",
                "| text/plain   | 2     |",
                "| image/png    | 10    |",
                "+--------------+-------+",
            ],
        );
    });

    test("console channel prints lines and tables to its output", () => {
        const output = new PassThrough();
        const read = collect(output);
        const channel = createConsoleChannel({ input: new PassThrough(), output, progressOutput: new PassThrough() });

        channel.printLine("Files: 3");
        channel.printTable(["A"], [["b"]]);

        assert.strictEqual(read(), "Files: 3\n+---+\n| A |\n+---+\n| b |\n+---+\n");
    });

    test("console channel confirms from an answered prompt", async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        const read = collect(output);
        const channel = createConsoleChannel({ input, output, progressOutput: new PassThrough() });

        const answer = channel.confirm("Delete /tmp/a.zip?");
        input.write("yes\n");

        assert.strictEqual(await answer, true);
        assert.ok(read().startsWith("Delete /tmp/a.zip? (y/n): "));
        channel.close?.();
    });

    test("console channel treats end of input as no", async () => {
        const input = new PassThrough();
        const channel = createConsoleChannel({ input, output: new PassThrough(), progressOutput: new PassThrough() });

        const answer = channel.confirm("Delete /tmp/a.zip?");
        input.end();

        assert.strictEqual(await answer, false);
    });

    test("console channel answers consecutive prompts from one chunk of input", async () => {
        const input = new PassThrough();
        const channel = createConsoleChannel({ input, output: new PassThrough(), progressOutput: new PassThrough() });

        const first = channel.confirm("Delete /tmp/a.zip?");
        input.write("y\nn\ny\n");

        assert.strictEqual(await first, true);
        assert.strictEqual(await channel.confirm("Delete /tmp/b.zip?"), false);
        assert.strictEqual(await channel.confirm("Delete /tmp/c.zip?"), true);
        channel.close?.();
    });

    test("console channel answers no once it is closed", async () => {
        const input = new PassThrough();
        const channel = createConsoleChannel({ input, output: new PassThrough(), progressOutput: new PassThrough() });

        const first = channel.confirm("Delete /tmp/a.zip?");
        input.write("yes\n");
        assert.strictEqual(await first, true);

        channel.close?.();

        assert.strictEqual(await channel.confirm("Delete /tmp/b.zip?"), false);
    });

    test("Ctrl+C during a prompt cancels it and releases the signal handler", async () => {
        const channel = createConsoleChannel({
            input: new PassThrough(),
            output: new PassThrough(),
            progressOutput: new PassThrough(),
        });
        const listenersBefore = process.listenerCount("SIGINT");

        const answer = channel.confirm("Delete /tmp/a.zip?");
        assert.strictEqual(process.listenerCount("SIGINT"), listenersBefore + 1);

        process.emit("SIGINT");

        await assert.rejects(answer, OperatorCancelledError);
        assert.strictEqual(process.listenerCount("SIGINT"), listenersBefore);
        channel.close?.();
    });

    test("progress is drawn only on terminals and cleared before the next line", () => {
        const output = new PassThrough();
        const readOutput = collect(output);
        const plain = new PassThrough();
        const readPlain = collect(plain);
        const terminal = Object.assign(new PassThrough(), { isTTY: true });
        const readTerminal = collect(terminal);

        createConsoleChannel({ output, progressOutput: plain }).reportProgress?.({
            bytesWritten: 1024,
            totalBytes: 2048,
            entryPath: "a.bin",
        });

        const channel = createConsoleChannel({ output, progressOutput: terminal });
        channel.reportProgress?.({ bytesWritten: 1024, totalBytes: 2048, entryPath: "a.bin" });
        channel.printLine("done");

        assert.strictEqual(readPlain(), "");
        assert.strictEqual(readTerminal(), "\rExtracting: 50% (1 KB / 2 KB)\n");
        assert.strictEqual(readOutput(), "done\n");
    });
});
