import type { Expr, Program, Stmt } from "../ast/ast";
import type { Printer } from "./printer";

// ─── Canonical text printer ───────────────────────────────────────────────────
//
// Every operator node is fully parenthesised, so the output re-parses to the
// same tree:
//
//   • binary / assignment   → `(left op right)`
//   • unary                 → `(op operand)`, no space
//   • strings               → double-quoted, verbatim
//   • floats                → always carry `.` or an exponent

const formatFloat = (value: number): string => {
    const text = String(value);
    return /[.eE]/.test(text) || !Number.isFinite(value) ? text : `${text}.0`;
};

export class TextPrinter implements Printer {
    readonly id = "text";
    readonly fileExtension = ".zl" as const;

    print(program: Program): string {
        return program.stmts.map(stmt => this.printStmt(stmt)).join("\n");
    }

    printStmt(stmt: Stmt): string {
        return `${this.printExpr(stmt.expr)};`;
    }

    printExpr(expr: Expr): string {
        switch (expr.kind) {
            case "Ident":
                return expr.name;

            case "Int":
                return expr.value.toString();

            case "Float":
                return formatFloat(expr.value);

            case "Bool":
                return expr.value ? "true" : "false";

            case "String":
                return `"${expr.value}"`;

            case "Unary":
                return `(${expr.op.value}${this.printExpr(expr.operand)})`;

            case "Binary":
                return `(${this.printExpr(expr.left)} ${expr.op.value} ${this.printExpr(expr.right)})`;

            case "Assign":
                return `(${expr.target} ${expr.op.value} ${this.printExpr(expr.value)})`;
        }
    }
}

export const textPrinter = new TextPrinter();
