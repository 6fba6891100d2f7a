#!/usr/bin/env node

import { Command } from "commander";
import * as path from "node:path";
import { formatCommand } from "./commands/format";
import { initCommand } from "./commands/init";
import { parseCommand } from "./commands/parse";
import { tokensCommand } from "./commands/tokens";

const VERSION = "0.1.0";

function createProgram(): Command {
    const program = new Command();

    program
        .name("zlang")
        .description("zlang lexer and expression parser")
        .helpOption("-h, --help", "Show help")
        .showHelpAfterError()
        .version(VERSION, "-v, --version", "Show version");

    program
        .command("tokens")
        .description("Print the token stream of a source text")
        .argument("[source]", "Source text to scan")
        .option("-f, --file <path>", "Read the source from a file")
        .action(async (source: string | undefined, options: { file?: string }) => {
            await tokensCommand({ source, file: options.file });
        });

    program
        .command("parse")
        .description("Parse a source text and print its statements")
        .argument("[source]", "Source text to parse")
        .option("-f, --file <path>", "Read the source from a file")
        .option("--format <id>", "Output format (text, json)", "text")
        .action(async (source: string | undefined, options: { file?: string; format: string }) => {
            await parseCommand({ source, file: options.file, format: options.format });
        });

    program
        .command("init")
        .description("Create zlang.json and project folders")
        .option("--cwd <path>", "Project directory", ".")
        .action(async (options: { cwd: string }) => {
            const cwd = path.resolve(process.cwd(), options.cwd);
            await initCommand(cwd);
        });

    program
        .command("format")
        .description("Parse every .zl file and write the printed programs to dist")
        .option("--cwd <path>", "Project directory", ".")
        .option("--format <id>", "Override the output format from zlang.json")
        .action(async (options: { cwd: string; format?: string }) => {
            const cwd = path.resolve(process.cwd(), options.cwd);
            await formatCommand(cwd, { format: options.format });
        });

    return program;
}

async function main(): Promise<void> {
    const program = createProgram();
    await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
    if (error instanceof Error) {
        console.error(`zlang: ${error.message}`);
    } else {
        console.error("zlang: unknown error");
    }
    process.exitCode = 1;
});
