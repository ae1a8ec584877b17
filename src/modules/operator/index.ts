import * as readline from "node:readline";

import { OperatorCancelledError } from "../../shared/errors";
import { formatBytes } from "../../shared/format";
import type { ExtractionProgress } from "../archiveReader";

/**
 * Everything the pipeline says to, or asks of, the person running it.
 */
export interface OperatorChannel {
    printLine(line?: string): void;
    printTable(headers: readonly string[], rows: readonly (readonly string[])[]): void;
    /**
     * Resolves `true` only for an explicit yes. Rejects with
     * {@link OperatorCancelledError} when the operator interrupts the prompt.
     */
    confirm(question: string): Promise<boolean>;
    reportProgress?(progress: ExtractionProgress): void;
    /** Releases the input; later prompts are answered "no". */
    close?(): void;
}

export interface ConsoleChannelOptions {
    readonly input?: NodeJS.ReadableStream;
    readonly output?: NodeJS.WritableStream;
    readonly progressOutput?: NodeJS.WritableStream & { readonly isTTY?: boolean };
}

export function isAffirmative(answer: string): boolean {
    const normalized = answer.trim().toLowerCase();

    return normalized === "y" || normalized === "yes";
}

export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
    const widths = headers.map((header, column) =>
        Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
    );
    const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
    const renderRow = (cells: readonly string[]): string =>
        `| ${widths.map((width, column) => (cells[column] ?? "").padEnd(width)).join(" | ")} |`;

    return [border, renderRow(headers), border, ...rows.map(renderRow), border];
}

export function createConsoleChannel(options: ConsoleChannelOptions = {}): OperatorChannel {
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const progressOutput = options.progressOutput ?? process.stderr;
    let progressVisible = false;
    let reader: AnswerReader | undefined;

    const writeLine = (line: string): void => {
        if (progressVisible) {
            progressOutput.write("\n");
            progressVisible = false;
        }

        output.write(`${line}\n`);
    };

    return {
        printLine(line = "") {
            writeLine(line);
        },
        printTable(headers, rows) {
            for (const line of renderTable(headers, rows)) {
                writeLine(line);
            }
        },
        async confirm(question) {
            if (progressVisible) {
                progressOutput.write("\n");
                progressVisible = false;
            }

            if (!reader) {
                reader = new AnswerReader(input, output);
            }

            const answer = await reader.ask(question);

            // End of input counts as "no".
            return answer !== undefined && isAffirmative(answer);
        },
        reportProgress(progress) {
            if (!progressOutput.isTTY) {
                return;
            }

            const percentage = progress.totalBytes > 0
                ? Math.floor((progress.bytesWritten / progress.totalBytes) * 100)
                : 100;
            progressOutput.write(
                `\rExtracting: ${percentage}% (${formatBytes(progress.bytesWritten)} / ${formatBytes(progress.totalBytes)})`,
            );
            progressVisible = true;
        },
        close() {
            reader?.close();
        },
    };
}

interface PendingAnswer {
    resolve(line: string | undefined): void;
    reject(error: unknown): void;
}

/**
 * One line reader for the whole run. Lines that arrive before a question is
 * asked are queued, so piped answers are consumed in order.
 */
class AnswerReader {
    private readonly lines: readline.Interface;

    private readonly buffered: string[] = [];

    private pending?: PendingAnswer;

    private ended = false;

    constructor(
        input: NodeJS.ReadableStream,
        private readonly output: NodeJS.WritableStream,
    ) {
        this.lines = readline.createInterface({ input, terminal: false });
        this.lines.on("line", (line) => {
            const pending = this.pending;

            if (pending) {
                this.pending = undefined;
                pending.resolve(line);
            } else {
                this.buffered.push(line);
            }
        });
        this.lines.on("close", () => {
            this.ended = true;
            this.settle((pending) => pending.resolve(undefined));
        });
    }

    /** Resolves `undefined` once input has ended. */
    async ask(question: string): Promise<string | undefined> {
        this.output.write(`${question} (y/n): `);

        const buffered = this.buffered.shift();

        if (buffered !== undefined) {
            return buffered;
        }

        if (this.ended) {
            return undefined;
        }

        const interrupt = (): void => {
            this.settle((pending) => pending.reject(new OperatorCancelledError("Confirmation interrupted")));
        };

        process.once("SIGINT", interrupt);

        try {
            return await new Promise<string | undefined>((resolve, reject) => {
                this.pending = { resolve, reject };
            });
        } finally {
            process.removeListener("SIGINT", interrupt);
        }
    }

    close(): void {
        if (!this.ended) {
            this.lines.close();
        }
    }

    private settle(action: (pending: PendingAnswer) => void): void {
        const pending = this.pending;
        this.pending = undefined;

        if (pending) {
            action(pending);
        }
    }
}
