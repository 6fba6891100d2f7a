import type { Token } from "../lexer/tokens";

// ─── AST Node Types ───────────────────────────────────────────────────────────
//
// Nodes are plain immutable records built once by the parser. Every node owns
// its children; nothing is shared between statements.

// Expressions
export type IdentExpr  = { readonly kind: "Ident";  readonly name: string };
export type IntExpr    = { readonly kind: "Int";    readonly value: bigint };
export type FloatExpr  = { readonly kind: "Float";  readonly value: number };
export type BoolExpr   = { readonly kind: "Bool";   readonly value: boolean };
export type StringExpr = { readonly kind: "String"; readonly value: string };

export type LiteralExpr = IntExpr | FloatExpr | BoolExpr | StringExpr;

export type UnaryExpr = {
    readonly kind:    "Unary";
    readonly op:      Token;
    readonly operand: Expr;
};

export type BinaryExpr = {
    readonly kind:  "Binary";
    readonly left:  Expr;
    readonly op:    Token;
    readonly right: Expr;
};

// The target is a name, not an expression: the parser only accepts a bare
// identifier on the left of an assignment operator.
export type AssignExpr = {
    readonly kind:   "Assign";
    readonly target: string;
    readonly op:     Token;
    readonly value:  Expr;
};

export type Expr =
    | IdentExpr
    | LiteralExpr
    | UnaryExpr
    | BinaryExpr
    | AssignExpr;

// Statements
export type ExprStmt = {
    readonly kind: "ExprStmt";
    readonly expr: Expr;
};

export type Stmt = ExprStmt;

export type Program = {
    readonly kind:  "Program";
    readonly stmts: readonly Stmt[];
};
