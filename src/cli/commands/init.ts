import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { CONFIG_FILE, DEFAULT_CONFIG, readConfig } from "../config";
import { ensureDir, pathExists } from "../fs";

/**
 * Writes a default `zlang.json` unless one exists, then creates the source and
 * output folders the effective config names.
 */
export async function initCommand(cwd: string): Promise<void> {
    if (await pathExists(path.join(cwd, CONFIG_FILE))) {
        console.log(`Kept existing ${CONFIG_FILE}`);
    } else {
        await writeFile(path.join(cwd, CONFIG_FILE), `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`, "utf8");
        console.log(`Created ${CONFIG_FILE}`);
    }

    const { src, dist } = await readConfig(cwd);
    await ensureDir(path.resolve(cwd, src), path.resolve(cwd, dist));

    console.log(`Ensured '${src}/', '${dist}/'`);
}
