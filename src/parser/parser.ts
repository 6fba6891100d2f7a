import type { Expr, Program, Stmt } from "../ast/ast";
import { ParseError, type LexError, type ParseFailure } from "../errors";
import type { Lexer, Scanner } from "../lexer/lexer";
import { TokenKind, makeToken, tokenKindToString, type Token } from "../lexer/tokens";
import { err, ok, type Result } from "../result";
import {
    ParseletRegistry,
    Precedence,
    type InfixParselet,
    type PrefixParselet,
} from "./parselets";

const describeToken = (token: Token): string =>
    `${tokenKindToString(token.kind)} ('${token.value}')`;

/**
 * Pratt parser over a lazily scanned token stream with one token of
 * lookahead. Each `parse()` call starts a fresh scan of the lexer's source.
 */
export class Parser {
    readonly registry: ParseletRegistry;

    private readonly lexer: Lexer;
    private scanner: Scanner;
    private currentToken: Token = makeToken(TokenKind.EOF);
    private lookaheadToken: Token | null = null;

    constructor(lexer: Lexer, registry: ParseletRegistry = ParseletRegistry.standard()) {
        this.lexer = lexer;
        this.registry = registry;
        this.scanner = lexer.cursor();
    }

    // ── Handler registration ──────────────────────────────────────────────────

    /** Functions register as prefix parselets, `{ precedence, parse }` objects as infix. */
    register(kind: TokenKind, parselet: PrefixParselet | InfixParselet): this {
        if (typeof parselet === "function") {
            this.registry.registerPrefix(kind, parselet);
        } else {
            this.registry.registerInfix(kind, parselet);
        }
        return this;
    }

    registerPrefix(kind: TokenKind, parselet: PrefixParselet): this {
        this.registry.registerPrefix(kind, parselet);
        return this;
    }

    registerInfix(kind: TokenKind, parselet: InfixParselet): this {
        this.registry.registerInfix(kind, parselet);
        return this;
    }

    // ── Token navigation ──────────────────────────────────────────────────────

    get current(): Token {
        return this.currentToken;
    }

    get lookahead(): Token | null {
        return this.lookaheadToken;
    }

    /**
     * Moves the lookahead into `current` and pulls the next token. Past the
     * end of input the lookahead is `null` and `current` stays on EOF.
     */
    advance(): Result<Token, LexError> {
        if (this.lookaheadToken !== null) {
            this.currentToken = this.lookaheadToken;
        }
        const pulled = this.scanner.next();
        if (!pulled.ok) return pulled;
        this.lookaheadToken = pulled.value;
        return ok(this.currentToken);
    }

    /** Advances, then requires the new current token to be `kind`. */
    expectNext(kind: TokenKind, message?: string): Result<Token, ParseFailure> {
        const moved = this.advance();
        if (!moved.ok) return moved;

        if (moved.value.kind !== kind) {
            return err(new ParseError(
                message ?? `Expected ${tokenKindToString(kind)} but got ${describeToken(moved.value)}`
            ));
        }
        return moved;
    }

    // ── Core Pratt loop ───────────────────────────────────────────────────────

    parseExpression(precedence: number = Precedence.Default): Result<Expr, ParseFailure> {
        const token = this.currentToken;
        const prefix = this.registry.prefixFor(token.kind);
        if (!prefix) {
            return err(new ParseError(`No parselet for token ${describeToken(token)}`));
        }

        const first = prefix(this, token);
        if (!first.ok) return first;
        let left = first.value;

        let infix = this.infixAhead();
        while (infix && precedence < infix.precedence) {
            const moved = this.advance();
            if (!moved.ok) return moved;

            const next = infix.parse(this, left, this.currentToken);
            if (!next.ok) return next;
            left = next.value;

            infix = this.infixAhead();
        }

        return ok(left);
    }

    private infixAhead(): InfixParselet | undefined {
        return this.lookaheadToken === null
            ? undefined
            : this.registry.infixFor(this.lookaheadToken.kind);
    }

    // ── Statements ────────────────────────────────────────────────────────────

    /** A lone `;` is an empty statement and yields `null`. */
    parseStatement(): Result<Stmt | null, ParseFailure> {
        if (this.currentToken.kind === TokenKind.Semicolon) {
            return ok(null);
        }
        return this.parseExprStatement();
    }

    private parseExprStatement(): Result<Stmt, ParseFailure> {
        const expr = this.parseExpression(Precedence.Default);
        if (!expr.ok) return expr;

        const ended = this.expectNext(
            TokenKind.Semicolon,
            `Statement must end with '${TokenKind.Semicolon}', got ${describeToken(this.lookaheadToken ?? this.currentToken)}`
        );
        if (!ended.ok) return ended;

        return ok({ kind: "ExprStmt", expr: expr.value });
    }

    /** Parse the whole source into a program, stopping at the first error. */
    parse(): Result<Program, ParseFailure> {
        const started = this.reset();
        if (!started.ok) return started;

        const stmts: Stmt[] = [];
        while (this.currentToken.kind !== TokenKind.EOF) {
            const stmt = this.parseStatement();
            if (!stmt.ok) return stmt;
            if (stmt.value !== null) {
                stmts.push(stmt.value);
            }

            // Step past the statement terminator
            const moved = this.advance();
            if (!moved.ok) return moved;
        }

        return ok({ kind: "Program", stmts });
    }

    /** Starts a fresh scan and loads `current` and `lookahead`. */
    reset(): Result<Token, LexError> {
        this.scanner = this.lexer.cursor();
        this.lookaheadToken = null;

        const first = this.scanner.next();
        if (!first.ok) return first;
        this.currentToken = first.value ?? makeToken(TokenKind.EOF);

        const second = this.scanner.next();
        if (!second.ok) return second;
        this.lookaheadToken = second.value;

        return ok(this.currentToken);
    }
}
