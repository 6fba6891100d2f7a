import type { Expr, FloatExpr, IntExpr } from "../ast/ast";
import { ParseError, type ParseFailure } from "../errors";
import { TokenKind, tokenKindToString, type Token } from "../lexer/tokens";
import { err, ok, type Result } from "../result";
import type { Parser } from "./parser";

// ─── Precedence ───────────────────────────────────────────────────────────────
//
// Logical `&` / `|` sit below equality and comparison: `1 & 2 == 2` groups as
// `1 & (2 == 2)`.

export const Precedence = {
    Default:     -1,
    AssignBelow: 0,
    Assign:      1,
    Logical:     3,
    Equals:      4,
    Lege:        5,
    AddSub:      6,
    MulDiv:      7,
    Prefix:      8,
} as const;

export type PrecedenceLevel = (typeof Precedence)[keyof typeof Precedence];

// ─── Parselet types ───────────────────────────────────────────────────────────

/** Starts an expression at `token`, which is the parser's current token. */
export type PrefixParselet = (parser: Parser, token: Token) => Result<Expr, ParseFailure>;

/** Extends `left` with the operator `token`, which is the parser's current token. */
export type InfixParselet = {
    /** Binding precedence compared against the caller's minimum. Any number works for extensions. */
    readonly precedence: number;
    readonly parse: (parser: Parser, left: Expr, token: Token) => Result<Expr, ParseFailure>;
};

// ─── Numeric literals ─────────────────────────────────────────────────────────

const FLOAT_TEXT   = /^[0-9]+(?:\.[0-9]*)?(?:[eE][+-]?[0-9]+)?$/;
const HEX_TEXT     = /^0[xX][0-9a-fA-F]+$/;
const DECIMAL_TEXT = /^[0-9]+$/;

/**
 * Converts the raw text of a Number token. Anything with `.`, `e` or `E` is a
 * float (so `0x1e` is a malformed float), then `0x` means hex, else decimal.
 */
export function parseNumber(text: string): Result<IntExpr | FloatExpr, ParseError> {
    if (/[.eE]/.test(text)) {
        if (!FLOAT_TEXT.test(text)) {
            return err(new ParseError(`Malformed float literal '${text}'`));
        }
        const value = Number(text);
        if (!Number.isFinite(value)) {
            return err(new ParseError(`Float literal '${text}' is out of range`));
        }
        return ok({ kind: "Float", value });
    }

    if (/^0[xX]/.test(text)) {
        if (!HEX_TEXT.test(text)) {
            return err(new ParseError(`Malformed hexadecimal literal '${text}'`));
        }
        return ok({ kind: "Int", value: BigInt(text) });
    }

    if (!DECIMAL_TEXT.test(text)) {
        return err(new ParseError(`Malformed integer literal '${text}'`));
    }
    return ok({ kind: "Int", value: BigInt(text) });
}

// ─── Standard prefix parselets ────────────────────────────────────────────────

export const identParselet: PrefixParselet = (_parser, token) =>
    ok({ kind: "Ident", name: token.value });

export const literalParselet: PrefixParselet = (_parser, token) => {
    switch (token.kind) {
        case TokenKind.String: return ok({ kind: "String", value: token.value });
        case TokenKind.True:   return ok({ kind: "Bool", value: true });
        case TokenKind.False:  return ok({ kind: "Bool", value: false });
        case TokenKind.Number: return parseNumber(token.value);
        default:
            return err(new ParseError(
                `${tokenKindToString(token.kind)} ('${token.value}') is not a literal`
            ));
    }
};

/** `+x`, `-x`, `!x`: the operand binds at Prefix precedence. */
export const unaryParselet: PrefixParselet = (parser, token) => {
    const moved = parser.advance();
    if (!moved.ok) return moved;

    const operand = parser.parseExpression(Precedence.Prefix);
    if (!operand.ok) return operand;

    return ok({ kind: "Unary", op: token, operand: operand.value });
};

/** `( expr )` yields the inner expression itself; grouping leaves no node. */
export const groupParselet: PrefixParselet = (parser) => {
    const moved = parser.advance();
    if (!moved.ok) return moved;

    const inner = parser.parseExpression(Precedence.Default);
    if (!inner.ok) return inner;

    const closed = parser.expectNext(
        TokenKind.CloseParen,
        "The grouped expression must end with a right parenthesis ')'"
    );
    if (!closed.ok) return closed;

    return inner;
};

// ─── Standard infix parselets ─────────────────────────────────────────────────

/** Left-associative: the right operand is parsed at the operator's own level. */
export const binaryParselet = (precedence: number): InfixParselet => ({
    precedence,
    parse: (parser, left, token) => {
        const moved = parser.advance();
        if (!moved.ok) return moved;

        const right = parser.parseExpression(precedence);
        if (!right.ok) return right;

        return ok({ kind: "Binary", left, op: token, right: right.value });
    },
});

/**
 * `=`, `+=`, ... Right-associative: the value is parsed just below Assign, so
 * `a = b = c` is `a = (b = c)`.
 */
const describeTarget = (expr: Expr): string => {
    switch (expr.kind) {
        case "Ident":  return `identifier '${expr.name}'`;
        case "Unary":
        case "Binary":
        case "Assign": return `${expr.kind} expression`;
        default:       return `${expr.kind} literal`;
    }
};

export const assignParselet: InfixParselet = {
    precedence: Precedence.Assign,
    parse: (parser, left, token) => {
        if (left.kind !== "Ident") {
            return err(new ParseError(
                `The left side of an assignment must be a simple identifier, got: ${describeTarget(left)}`
            ));
        }

        const moved = parser.advance();
        if (!moved.ok) return moved;

        const value = parser.parseExpression(Precedence.AssignBelow);
        if (!value.ok) return value;

        return ok({ kind: "Assign", target: left.name, op: token, value: value.value });
    },
};

// ─── Registry ─────────────────────────────────────────────────────────────────

export class ParseletRegistry {
    private readonly prefixMap = new Map<TokenKind, PrefixParselet>();
    private readonly infixMap = new Map<TokenKind, InfixParselet>();

    /** A registry seeded with the standard grammar. */
    static standard(): ParseletRegistry {
        const registry = new ParseletRegistry();

        registry
            .registerPrefix(TokenKind.Identifier, identParselet)
            .registerPrefix(TokenKind.Number,     literalParselet)
            .registerPrefix(TokenKind.String,     literalParselet)
            .registerPrefix(TokenKind.True,       literalParselet)
            .registerPrefix(TokenKind.False,      literalParselet)
            .registerPrefix(TokenKind.Plus,       unaryParselet)
            .registerPrefix(TokenKind.Minus,      unaryParselet)
            .registerPrefix(TokenKind.Not,        unaryParselet)
            .registerPrefix(TokenKind.OpenParen,  groupParselet);

        const binaries: [TokenKind, PrecedenceLevel][] = [
            [TokenKind.Plus,          Precedence.AddSub],
            [TokenKind.Minus,         Precedence.AddSub],
            [TokenKind.Star,          Precedence.MulDiv],
            [TokenKind.Slash,         Precedence.MulDiv],
            [TokenKind.Less,          Precedence.Lege],
            [TokenKind.LessEquals,    Precedence.Lege],
            [TokenKind.Greater,       Precedence.Lege],
            [TokenKind.GreaterEquals, Precedence.Lege],
            [TokenKind.Equals,        Precedence.Equals],
            [TokenKind.NotEquals,     Precedence.Equals],
            [TokenKind.Ampersand,     Precedence.Logical],
            [TokenKind.Pipe,          Precedence.Logical],
        ];
        for (const [kind, precedence] of binaries) {
            registry.registerInfix(kind, binaryParselet(precedence));
        }

        for (const kind of [
            TokenKind.Assign,
            TokenKind.PlusAssign,
            TokenKind.MinusAssign,
            TokenKind.StarAssign,
            TokenKind.SlashAssign,
            TokenKind.AmpersandAssign,
            TokenKind.PipeAssign,
        ]) {
            registry.registerInfix(kind, assignParselet);
        }

        return registry;
    }

    registerPrefix(kind: TokenKind, parselet: PrefixParselet): this {
        this.prefixMap.set(kind, parselet);
        return this;
    }

    registerInfix(kind: TokenKind, parselet: InfixParselet): this {
        this.infixMap.set(kind, parselet);
        return this;
    }

    prefixFor(kind: TokenKind): PrefixParselet | undefined {
        return this.prefixMap.get(kind);
    }

    infixFor(kind: TokenKind): InfixParselet | undefined {
        return this.infixMap.get(kind);
    }
}
