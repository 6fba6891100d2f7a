/** Raised by the scanner: unterminated string, malformed numeral, unknown character. */
export class LexError extends Error {
    constructor(message: string, readonly position: number) {
        super(message);
        this.name = "LexError";
    }
}

/** Raised by the parser on the first malformed construct. */
export class ParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ParseError";
    }
}

export type ParseFailure = LexError | ParseError;
