import { readFile } from "node:fs/promises";
import * as path from "node:path";

export type SourceInput = {
    source?: string;
    file?: string;
};

/** Inline source wins over `--file`; one of them is required. */
export async function readSource(input: SourceInput, cwd: string = process.cwd()): Promise<string> {
    if (input.source !== undefined) {
        return input.source;
    }
    if (input.file !== undefined) {
        return readFile(path.resolve(cwd, input.file), "utf8");
    }
    throw new Error("Provide source text or --file <path>.");
}
