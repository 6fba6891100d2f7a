import { Lexer } from "../../lexer/lexer";
import { formatToken } from "../../lexer/tokens";
import { readSource, type SourceInput } from "../input";

/** Prints one line per token as the scan produces it; a lexical error stops the scan. */
export async function tokensCommand(input: SourceInput): Promise<void> {
    const source = await readSource(input);

    for (const step of new Lexer(source)) {
        if (!step.ok) {
            throw step.error;
        }
        console.log(formatToken(step.value));
    }
}
