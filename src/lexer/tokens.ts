// Fixed-text kinds use their canonical source text as the enum value. The
// bracketed values of sentinel and variable-text kinds can never be lexed.
export enum TokenKind {
    Illegal = "<illegal>",
    EOF = "<eof>",

    Identifier = "<identifier>",
    Number = "<number>",
    String = "<string>",

    Assign = "=",
    Plus = "+",
    Minus = "-",
    Star = "*",
    Slash = "/",
    PlusAssign = "+=",
    MinusAssign = "-=",
    StarAssign = "*=",
    SlashAssign = "/=",

    Not = "!",
    Ampersand = "&",
    Pipe = "|",
    AmpersandAssign = "&=",
    PipeAssign = "|=",

    Less = "<",
    LessEquals = "<=",
    Greater = ">",
    GreaterEquals = ">=",
    Equals = "==",
    NotEquals = "!=",

    Comma = ",",
    Semicolon = ";",

    OpenParen = "(",
    CloseParen = ")",
    OpenCurly = "{",
    CloseCurly = "}",
    OpenBracket = "[",
    CloseBracket = "]",

    // Keywords
    True = "true",
    False = "false",
    Let = "let",
    Return = "return",
    Fn = "fn",
    If = "if",
    Else = "else",
}

export type Token = {
    readonly kind: TokenKind;
    readonly value: string;
};

const SENTINELS: ReadonlySet<TokenKind> = new Set([TokenKind.Illegal, TokenKind.EOF]);

const VARIABLE_TEXT: ReadonlySet<TokenKind> = new Set([
    TokenKind.Identifier,
    TokenKind.Number,
    TokenKind.String,
]);

const KIND_NAMES = new Map<TokenKind, string>(
    Object.entries(TokenKind).map(([name, kind]): [TokenKind, string] => [kind, name])
);

const FIXED_KINDS: TokenKind[] = Object.values(TokenKind).filter(
    kind => !SENTINELS.has(kind) && !VARIABLE_TEXT.has(kind)
);

const startsWithLetter = (text: string): boolean => /^[A-Za-z]/.test(text);

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map(
    FIXED_KINDS.filter(kind => startsWithLetter(kind)).map((kind): [string, TokenKind] => [kind, kind])
);

export const SYMBOLS: ReadonlyMap<string, TokenKind> = new Map(
    FIXED_KINDS.filter(kind => !startsWithLetter(kind)).map((kind): [string, TokenKind] => [kind, kind])
);

export const makeToken = (kind: TokenKind, value: string = kind): Token => ({ kind, value });

export const isVariableText = (kind: TokenKind): boolean => VARIABLE_TEXT.has(kind);

export const isKeyword = (kind: TokenKind): boolean => KEYWORDS.has(kind);

export const tokenKindToString = (kind: TokenKind): string =>
    KIND_NAMES.get(kind) ?? `Unknown(${kind})`;

export const formatToken = (token: Token): string =>
    isVariableText(token.kind) || isKeyword(token.kind)
        ? `${tokenKindToString(token.kind)} (${token.value})`
        : `${tokenKindToString(token.kind)} ()`;
