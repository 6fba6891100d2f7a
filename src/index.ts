import type { Expr, Program } from "./ast/ast";
import { ParseError, type ParseFailure } from "./errors";
import { Lexer } from "./lexer/lexer";
import { TokenKind, tokenKindToString } from "./lexer/tokens";
import { ParseletRegistry, Precedence } from "./parser/parselets";
import { Parser } from "./parser/parser";
import { err, ok, type Result } from "./result";

export * from "./ast/ast";
export * from "./errors";
export * from "./lexer/lexer";
export * from "./lexer/tokens";
export * from "./parser/parselets";
export * from "./parser/parser";
export * from "./printers/printer";
export * from "./printers/index";
export { TextPrinter, textPrinter } from "./printers/text";
export { JsonPrinter, jsonPrinter } from "./printers/json";
export * from "./result";

// ─── Convenience factories ────────────────────────────────────────────────────

export function createParser(source: string, registry?: ParseletRegistry): Parser {
    return new Parser(new Lexer(source), registry);
}

export function parseProgram(source: string, registry?: ParseletRegistry): Result<Program, ParseFailure> {
    return createParser(source, registry).parse();
}

/** Parses a single expression that must span the whole source (no `;`). */
export function parseExpression(source: string, registry?: ParseletRegistry): Result<Expr, ParseFailure> {
    const parser = createParser(source, registry);
    const started = parser.reset();
    if (!started.ok) return started;

    const expr = parser.parseExpression(Precedence.Default);
    if (!expr.ok) return expr;

    const rest = parser.lookahead;
    if (rest !== null && rest.kind !== TokenKind.EOF) {
        return err(new ParseError(
            `Unexpected ${tokenKindToString(rest.kind)} ('${rest.value}') after expression`
        ));
    }
    return ok(expr.value);
}
