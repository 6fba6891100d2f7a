import type { Expr, Program, Stmt } from "../ast/ast";

// ─── Printer interface ────────────────────────────────────────────────────────
//
// A printer renders a parsed Program back to text. `printExpr` produces an
// inline string; `printStmt` produces the full line for one statement.

export interface Printer {
    /** Stable printer identifier, used by config and CLI flags. */
    readonly id: string;

    /** Extension for files written with this printer (including dot). */
    readonly fileExtension: `.${string}`;

    print(program: Program): string;

    printStmt(stmt: Stmt): string;

    printExpr(expr: Expr): string;
}

export type PrinterRegistry = Record<string, Printer>;

export function getPrinter(registry: PrinterRegistry, id: string): Printer {
    const printer = registry[id];
    if (!printer) {
        const available = Object.keys(registry).sort().join(", ");
        throw new Error(`Unknown format '${id}'. Available formats: ${available}`);
    }
    return printer;
}

export function withOutputExtension(filePath: string, printer: Printer): string {
    if (/\.[^./\\]+$/.test(filePath)) {
        return filePath.replace(/\.[^./\\]+$/, printer.fileExtension);
    }
    return `${filePath}${printer.fileExtension}`;
}
