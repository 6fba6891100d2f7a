import { readdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { createParser } from "../../index";
import { resolvePrinter } from "../../printers";
import { withOutputExtension } from "../../printers/printer";
import { readConfig } from "../config";
import { ensureDir, pathExists } from "../fs";

export const SOURCE_EXTENSION = ".zl";

export type FormatCommandOptions = {
    format?: string;
};

export type FormatSummary = {
    written: string[];
    failed: string[];
};

/** Source files below `srcDir` as paths relative to it, in a stable order. */
async function collectSources(srcDir: string, prefix = ""): Promise<string[]> {
    const found: string[] = [];
    for (const entry of await readdir(path.join(srcDir, prefix), { withFileTypes: true })) {
        const relativePath = path.join(prefix, entry.name);
        if (entry.isDirectory()) {
            found.push(...await collectSources(srcDir, relativePath));
        } else if (entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION)) {
            found.push(relativePath);
        }
    }
    return found.sort();
}

/**
 * Parses every source file under the configured `src` and writes the printed
 * program to the mirrored path under `dist`. A file that fails to parse is
 * reported and skipped; the command fails once all files were tried.
 */
export async function formatCommand(cwd: string, options: FormatCommandOptions = {}): Promise<FormatSummary> {
    const config = await readConfig(cwd);
    const printer = resolvePrinter(options.format?.trim() || config.format);

    const srcDir = path.resolve(cwd, config.src);
    const distDir = path.resolve(cwd, config.dist);

    if (!(await pathExists(srcDir))) {
        throw new Error(`Source directory '${config.src}' not found.`);
    }

    await ensureDir(distDir);

    const summary: FormatSummary = { written: [], failed: [] };
    const sources = await collectSources(srcDir);
    if (sources.length === 0) {
        console.log(`No ${SOURCE_EXTENSION} files found under '${config.src}'.`);
        return summary;
    }

    for (const relativePath of sources) {
        const source = await readFile(path.join(srcDir, relativePath), "utf8");
        const parsed = createParser(source).parse();

        if (!parsed.ok) {
            console.error(`${relativePath}: ${parsed.error.name}: ${parsed.error.message}`);
            summary.failed.push(relativePath);
            continue;
        }

        const outRelativePath = withOutputExtension(relativePath, printer);
        const distOutPath = path.join(distDir, outRelativePath);
        await ensureDir(path.dirname(distOutPath));
        await writeFile(distOutPath, `${printer.print(parsed.value)}\n`, "utf8");
        summary.written.push(outRelativePath);
    }

    console.log(
        `Formatted ${summary.written.length} file(s) as '${printer.id}' into '${config.dist}'.`
    );

    if (summary.failed.length > 0) {
        throw new Error(`${summary.failed.length} file(s) failed to parse.`);
    }
    return summary;
}
