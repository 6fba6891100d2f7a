import type { Expr, Program, Stmt } from "../ast/ast";
import type { Printer } from "./printer";

// JSON has no bigint; integer literals are written as decimal strings.
const replacer = (_key: string, value: unknown): unknown =>
    typeof value === "bigint" ? value.toString() : value;

export class JsonPrinter implements Printer {
    readonly id = "json";
    readonly fileExtension = ".json" as const;

    print(program: Program): string {
        return JSON.stringify(program, replacer, 2);
    }

    printStmt(stmt: Stmt): string {
        return JSON.stringify(stmt, replacer, 2);
    }

    printExpr(expr: Expr): string {
        return JSON.stringify(expr, replacer, 2);
    }
}

export const jsonPrinter = new JsonPrinter();
