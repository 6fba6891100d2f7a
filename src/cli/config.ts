import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { printers } from "../printers";
import { pathExists } from "./fs";

export type ZlangConfig = {
    src: string;
    dist: string;
    format: string;
};

export const CONFIG_FILE = "zlang.json";

export const DEFAULT_CONFIG: ZlangConfig = {
    src: "src",
    dist: "dist",
    format: "text",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

export async function readConfig(cwd: string): Promise<ZlangConfig> {
    const configPath = path.join(cwd, CONFIG_FILE);
    if (!(await pathExists(configPath))) {
        throw new Error(`Missing ${CONFIG_FILE}. Run 'zlang init' first.`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(await readFile(configPath, "utf8"));
    } catch {
        throw new Error(`Invalid ${CONFIG_FILE}. Ensure it contains valid JSON.`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Invalid ${CONFIG_FILE}. Expected an object.`);
    }

    const values: Partial<ZlangConfig> = {};
    for (const key of ["src", "dist", "format"] as const) {
        const value = parsed[key] ?? DEFAULT_CONFIG[key];
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`Invalid ${CONFIG_FILE}. '${key}' must be a non-empty string.`);
        }
        values[key] = value;
    }

    const config: ZlangConfig = { ...DEFAULT_CONFIG, ...values };
    if (!(config.format in printers)) {
        const available = Object.keys(printers).sort().join(", ");
        throw new Error(`Invalid ${CONFIG_FILE}. 'format' must be one of: ${available}.`);
    }

    return config;
}
