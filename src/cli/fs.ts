import { mkdir, stat } from "node:fs/promises";

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await stat(filePath);
        return true;
    } catch {
        return false;
    }
}

/** Creates each directory (and its parents) that is not there yet. */
export async function ensureDir(...dirPaths: string[]): Promise<void> {
    for (const dirPath of dirPaths) {
        await mkdir(dirPath, { recursive: true });
    }
}
