import { createParser } from "../../index";
import { resolvePrinter } from "../../printers";
import { unwrap } from "../../result";
import { readSource, type SourceInput } from "../input";

export type ParseCommandOptions = SourceInput & {
    format?: string;
};

export async function parseCommand(options: ParseCommandOptions): Promise<void> {
    const printer = resolvePrinter(options.format?.trim() || "text");
    const source = await readSource(options);
    const program = unwrap(createParser(source).parse());

    if (program.stmts.length > 0) {
        console.log(printer.print(program));
    }
}
