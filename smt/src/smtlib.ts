import { Comparator, Expr } from "../../lang";
import { formatExpr, SsaStatement } from "../../ssa";
import { collectNames, separateInputs } from "./names";

const arithOps = { add: "+", sub: "-", mul: "*", div: "div" } as const;

function printNum(value: bigint): string {
    return value < 0n ? `(- ${-value})` : value.toString();
}

function printComparison(op: Comparator, left: string, right: string): string {
    switch (op) {
        case "==": return `(= ${left} ${right})`;
        case "!=": return `(not (= ${left} ${right}))`;
        default: return `(${op} ${left} ${right})`;
    }
}

export function printTerm(e: Expr): string
{
    switch (e.type) {
        case "num":
            return printNum(e.value);
        case "var":
            return e.name;
        case "bin":
            return `(${arithOps[e.operation]} ${printTerm(e.left)} ${printTerm(e.right)})`;
        case "cond":
            return `(ite ${printFormula(e)} 1 0)`;
    }
}

// an arithmetic expression in condition position holds when it is non-zero
export function printFormula(e: Expr): string
{
    if (e.type !== "cond") {
        return `(not (= ${printTerm(e)} 0))`;
    }
    return printComparison(e.op, printTerm(e.left), printTerm(e.right));
}

/**
 * Renders the constraint system the verifier builds as an SMT-LIB script:
 * one integer constant per name, one equation per definition, and a
 * push/check-sat/pop query per assertion asking for a counterexample.
 */
export function toSmtLib(ssa: readonly SsaStatement[]): string
{
    const encoded = separateInputs(ssa);
    const lines = collectNames(encoded).map(name => `(declare-const ${name} Int)`);
    const queries: string[] = [];

    for (const s of encoded) {
        switch (s.type) {
            case "def":
                lines.push(`(assert (= ${s.name} ${printTerm(s.expr)}))`);
                break;
            case "branch":
                lines.push(`; ${s.kind} ${formatExpr(s.condition)}`);
                break;
            case "assert":
                queries.push(
                    `; assert(${formatExpr(s.condition)})`,
                    "(push 1)",
                    `(assert (not ${printFormula(s.condition)}))`,
                    "(check-sat)",
                    "(pop 1)"
                );
                break;
        }
    }

    return [...lines, ...queries].join("\n");
}
