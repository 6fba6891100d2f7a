import { LexError } from "../errors";
import { err, ok, type Result } from "../result";
import { KEYWORDS, SYMBOLS, TokenKind, makeToken, type Token } from "./tokens";

/** `null` means the lexeme was consumed without producing a token (whitespace). */
export type ScanResult = Result<Token | null, LexError>;

export type ScanHandler = (scanner: Scanner, match: RegExpMatchArray) => ScanResult;

export type ScanPattern = {
    regex: RegExp;
    handler: ScanHandler;
};

// ─── Helpers ──────────────────────────────────────────────────────────────────

const skipHandler: ScanHandler = () => ok(null);

const valueHandler = (kind: TokenKind, group = 0): ScanHandler =>
    (_scanner, match) => ok(makeToken(kind, match[group]));

// Every lexeme the operator and punctuation patterns can match has a kind in
// SYMBOLS; a miss here is a bug in the table, not in the input.
const symbolHandler: ScanHandler = (_scanner, match) => {
    const kind = SYMBOLS.get(match[0]);
    if (kind === undefined) {
        throw new Error(`No token kind for symbol '${match[0]}'`);
    }
    return ok(makeToken(kind));
};

const secondIndexOf = (text: string, chars: string): number => {
    let seen = false;
    for (let i = 0; i < text.length; i++) {
        if (chars.includes(text[i])) {
            if (seen) return i;
            seen = true;
        }
    }
    return -1;
};

// Decimal numerals: at most one '.', at most one exponent marker. The raw text
// is kept; conversion happens in the parser.
const decimalHandler: ScanHandler = (scanner, match) => {
    const text = match[0];
    const start = scanner.pos - text.length;

    const secondPoint = secondIndexOf(text, ".");
    if (secondPoint >= 0) {
        return err(new LexError(
            `The decimal point ('.') can only appear once in a number: '${text}'`,
            start + secondPoint
        ));
    }

    const secondExponent = secondIndexOf(text, "eE");
    if (secondExponent >= 0) {
        return err(new LexError(
            `The exponent marker ('e') can only appear once in a number: '${text}'`,
            start + secondExponent
        ));
    }

    return ok(makeToken(TokenKind.Number, text));
};

// ─── Default patterns ─────────────────────────────────────────────────────────

export const DEFAULT_PATTERNS: ScanPattern[] = [
    // Whitespace
    { regex: /^[ \t\r\n]+/, handler: skipHandler },

    // String literals: verbatim, no escapes, quotes dropped from the value
    { regex: /^"([^"]*)"/, handler: valueHandler(TokenKind.String, 1) },
    {
        regex: /^"/,
        handler: (scanner) => err(new LexError(
            `Unterminated string literal starting at position ${scanner.pos - 1}`,
            scanner.pos - 1
        )),
    },

    // Operators; a trailing '=' always joins the lexeme (==, !=, <=, +=, ...)
    { regex: /^[=!<>+\-*\/&|]=?/, handler: symbolHandler },

    // Punctuation
    { regex: /^[,;(){}[\]]/, handler: symbolHandler },

    // Identifiers & keywords (keywords keep their source spelling)
    {
        regex: /^[A-Za-z_][A-Za-z0-9_]*/,
        handler: (_scanner, match) => {
            const word = match[0];
            return ok(makeToken(KEYWORDS.get(word) ?? TokenKind.Identifier, word));
        },
    },

    // Hex integers. The digit run may be empty and the parser rejects "0x"
    { regex: /^0[xX][0-9a-fA-F]*/, handler: valueHandler(TokenKind.Number) },

    // Decimal integers and floats; a sign only directly after an exponent marker
    { regex: /^[0-9](?:[0-9.]|[eE][+-]?)*/, handler: decimalHandler },
];

// ─── Scanner ──────────────────────────────────────────────────────────────────

/**
 * A single forward-only scan over the source. `next()` produces one token per
 * call, then exactly one EOF token, then `null` for every later call.
 */
export class Scanner {
    readonly source: string;
    pos: number;

    private readonly patterns: readonly ScanPattern[];
    private finished = false;

    constructor(source: string, patterns: readonly ScanPattern[] = DEFAULT_PATTERNS) {
        this.source = source;
        this.patterns = patterns;
        this.pos = 0;
    }

    remainder(): string {
        return this.source.slice(this.pos);
    }

    advance(n: number): void {
        this.pos += n;
    }

    next(): Result<Token | null, LexError> {
        while (this.pos < this.source.length) {
            const step = this.scanOne();
            if (!step.ok || step.value !== null) {
                return step;
            }
        }

        if (this.finished) {
            return ok(null);
        }
        this.finished = true;
        return ok(makeToken(TokenKind.EOF));
    }

    private scanOne(): ScanResult {
        const remaining = this.remainder();

        for (const { regex, handler } of this.patterns) {
            const match = remaining.match(regex);
            if (match) {
                this.advance(match[0].length);
                return handler(this, match);
            }
        }

        return err(new LexError(
            `Unexpected character '${remaining[0]}' at position ${this.pos}`,
            this.pos
        ));
    }
}

// ─── Lexer ────────────────────────────────────────────────────────────────────

/**
 * Source text plus the patterns that scan it. Every `cursor()` (and every
 * iteration) starts an independent scan from the beginning.
 */
export class Lexer implements Iterable<Result<Token, LexError>> {
    readonly source: string;

    private readonly patterns: readonly ScanPattern[];

    constructor(source: string, patterns: readonly ScanPattern[] = DEFAULT_PATTERNS) {
        this.source = source;
        this.patterns = patterns;
    }

    cursor(): Scanner {
        return new Scanner(this.source, this.patterns);
    }

    /** Yields each token, ending after EOF or after the first error. */
    *[Symbol.iterator](): Generator<Result<Token, LexError>, void, undefined> {
        const scanner = this.cursor();
        while (true) {
            const step = scanner.next();
            if (!step.ok) {
                yield step;
                return;
            }
            if (step.value === null) {
                return;
            }
            yield ok(step.value);
        }
    }
}

/** Scans the whole source; the token list always ends with EOF. */
export function tokenize(source: string): Result<Token[], LexError> {
    const tokens: Token[] = [];
    for (const step of new Lexer(source)) {
        if (!step.ok) return step;
        tokens.push(step.value);
    }
    return ok(tokens);
}
