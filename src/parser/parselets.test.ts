import { describe, it, expect } from "vitest";
import { ParseError } from "../errors";
import { createParser, parseProgram } from "../index";
import { Lexer } from "../lexer/lexer";
import { TokenKind } from "../lexer/tokens";
import { textPrinter } from "../printers/text";
import { err, ok, unwrap } from "../result";
import {
    ParseletRegistry,
    Precedence,
    assignParselet,
    binaryParselet,
    parseNumber,
    type PrefixParselet,
} from "./parselets";
import { Parser } from "./parser";

// `let <assignment>` read as the assignment itself: advances past `let` and
// requires an assignment expression to follow.
const letParselet: PrefixParselet = (parser) => {
    const moved = parser.advance();
    if (!moved.ok) return moved;

    const binding = parser.parseExpression(Precedence.Default);
    if (!binding.ok) return binding;
    if (binding.value.kind !== "Assign") {
        return err(new ParseError("Expected an assignment after 'let'"));
    }
    return binding;
};

function render(parser: Parser): string {
    return textPrinter.print(unwrap(parser.parse()));
}

// ─── Numeric literals ─────────────────────────────────────────────────────────

describe("parseNumber", () => {
    it("reads decimal integers", () => {
        expect(parseNumber("10")).toEqual(ok({ kind: "Int", value: 10n }));
    });

    it("reads hexadecimal integers in either case", () => {
        expect(parseNumber("0xff")).toEqual(ok({ kind: "Int", value: 255n }));
        expect(parseNumber("0XFF")).toEqual(ok({ kind: "Int", value: 255n }));
    });

    it("reads floats with a point, an exponent or both", () => {
        expect(parseNumber("0.5")).toEqual(ok({ kind: "Float", value: 0.5 }));
        expect(parseNumber("5e2")).toEqual(ok({ kind: "Float", value: 500 }));
        expect(parseNumber("1.5E+2")).toEqual(ok({ kind: "Float", value: 150 }));
        expect(parseNumber("1.e1")).toEqual(ok({ kind: "Float", value: 10 }));
    });

    it("rejects an exponent without digits", () => {
        expect(parseNumber("5e+")).toEqual(err(new ParseError("Malformed float literal '5e+'")));
    });

    it("rejects floats beyond the double range", () => {
        expect(parseNumber("2e308")).toEqual(err(new ParseError("Float literal '2e308' is out of range")));
        expect(parseNumber("1.7e308")).toEqual(ok({ kind: "Float", value: 1.7e308 }));
    });

    it("rejects a hex prefix without digits", () => {
        expect(parseNumber("0X")).toEqual(err(new ParseError("Malformed hexadecimal literal '0X'")));
    });
});

// ─── Standard registry ────────────────────────────────────────────────────────

describe("standard registry", () => {
    const registry = ParseletRegistry.standard();

    it("binds each operator family at its level", () => {
        expect(registry.infixFor(TokenKind.Assign)?.precedence).toBe(Precedence.Assign);
        expect(registry.infixFor(TokenKind.PipeAssign)?.precedence).toBe(Precedence.Assign);
        expect(registry.infixFor(TokenKind.Pipe)?.precedence).toBe(Precedence.Logical);
        expect(registry.infixFor(TokenKind.NotEquals)?.precedence).toBe(Precedence.Equals);
        expect(registry.infixFor(TokenKind.GreaterEquals)?.precedence).toBe(Precedence.Lege);
        expect(registry.infixFor(TokenKind.Minus)?.precedence).toBe(Precedence.AddSub);
        expect(registry.infixFor(TokenKind.Slash)?.precedence).toBe(Precedence.MulDiv);
    });

    it("orders logical below equality and comparison", () => {
        expect(Precedence.Logical).toBeLessThan(Precedence.Equals);
        expect(Precedence.Equals).toBeLessThan(Precedence.Lege);
    });

    it("shares one assignment parselet across the assignment family", () => {
        expect(registry.infixFor(TokenKind.StarAssign)).toBe(assignParselet);
    });

    it("has no parselets for keywords outside the expression grammar", () => {
        expect(registry.prefixFor(TokenKind.Let)).toBeUndefined();
        expect(registry.prefixFor(TokenKind.Fn)).toBeUndefined();
        expect(registry.infixFor(TokenKind.OpenParen)).toBeUndefined();
    });

    it("registers unary parselets only for + - !", () => {
        expect(registry.prefixFor(TokenKind.Plus)).toBeDefined();
        expect(registry.prefixFor(TokenKind.Minus)).toBeDefined();
        expect(registry.prefixFor(TokenKind.Not)).toBeDefined();
        expect(registry.prefixFor(TokenKind.Star)).toBeUndefined();
    });
});

// ─── Extension ────────────────────────────────────────────────────────────────

describe("registering parselets", () => {
    it("adds a prefix form without touching the engine", () => {
        const parser = createParser("let total = 1 + 2;").registerPrefix(TokenKind.Let, letParselet);
        expect(render(parser)).toBe("(total = (1 + 2));");
    });

    it("lets the added parselet report its own errors", () => {
        const parser = createParser("let 1;").registerPrefix(TokenKind.Let, letParselet);
        const result = parser.parse();
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.message).toBe("Expected an assignment after 'let'");
        }
    });

    it("re-binds an operator at another precedence", () => {
        const parser = createParser("1 & 2 == 2;")
            .registerInfix(TokenKind.Ampersand, binaryParselet(Precedence.MulDiv + 1));
        expect(render(parser)).toBe("((1 & 2) == 2);");
    });

    it("dispatches on the parselet shape", () => {
        const parser = new Parser(new Lexer("let a = b & c == d;"))
            .register(TokenKind.Let, letParselet)
            .register(TokenKind.Ampersand, binaryParselet(Precedence.MulDiv + 1));
        expect(render(parser)).toBe("(a = ((b & c) == d));");
    });

    it("keeps registrations on the parser's own registry", () => {
        createParser("let a = 1;").registerPrefix(TokenKind.Let, letParselet);
        expect(parseProgram("let a = 1;").ok).toBe(false);
    });

    it("accepts a prepared registry", () => {
        const registry = ParseletRegistry.standard().registerPrefix(TokenKind.Let, letParselet);
        expect(textPrinter.print(unwrap(parseProgram("let a = 1; let b = a;", registry))))
            .toBe("(a = 1);\n(b = a);");
    });
});
