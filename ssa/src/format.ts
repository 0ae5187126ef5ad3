import { BinaryOperation, Expr } from "../../lang";
import { SsaStatement } from "./ssa";

const symbols: Record<BinaryOperation, string> = {
    add: "+",
    sub: "-",
    mul: "*",
    div: "/",
};

// no parentheses are printed, so the text does not always re-parse to the same tree
export function formatExpr(e: Expr): string
{
    switch (e.type) {
        case "num":
            return e.value.toString();
        case "var":
            return e.name;
        case "bin":
            return `${formatExpr(e.left)} ${symbols[e.operation]} ${formatExpr(e.right)}`;
        case "cond":
            return `${formatExpr(e.left)} ${e.op} ${formatExpr(e.right)}`;
        default:
            return JSON.stringify(e);
    }
}

export function formatStatement(s: SsaStatement): string
{
    switch (s.type) {
        case "def":
            return `${s.name} := ${formatExpr(s.expr)}`;
        case "branch":
            return `${s.kind} ${formatExpr(s.condition)}`;
        case "assert":
            return `assert(${formatExpr(s.condition)})`;
    }
}

export function format(ssa: readonly SsaStatement[]): string
{
    return ssa.map(formatStatement).join("\n");
}
