import { Expr } from "../../lang";
import { definedVars, SsaStatement } from "../../ssa";

export const INPUT_PREFIX = "free!";

function collectExprNames(e: Expr, out: Set<string>): void
{
    switch (e.type) {
        case "num":
            break;
        case "var":
            out.add(e.name);
            break;
        case "bin":
        case "cond":
            collectExprNames(e.left, out);
            collectExprNames(e.right, out);
            break;
    }
}

// every name a stream mentions, defined or free, in order of first appearance
export function collectNames(ssa: readonly SsaStatement[]): string[]
{
    const out = new Set<string>();
    for (const s of ssa) {
        if (s.type === "def") {
            collectExprNames(s.expr, out);
            out.add(s.name);
        } else {
            collectExprNames(s.condition, out);
        }
    }
    return [...out];
}

function renameInputs(e: Expr, defined: ReadonlySet<string>): Expr
{
    switch (e.type) {
        case "num":
            return e;
        case "var":
            return e.input && defined.has(e.name) ? { ...e, name: INPUT_PREFIX + e.name } : e;
        case "bin":
        case "cond":
            return { ...e, left: renameInputs(e.left, defined), right: renameInputs(e.right, defined) };
    }
}

/**
 * A source variable spelled like a version (`x_1`) prints the same as the
 * definition it collides with. Before encoding, such an input is renamed to
 * `free!x_1` so the solver sees two different constants.
 */
export function separateInputs(ssa: readonly SsaStatement[]): SsaStatement[]
{
    const defined = definedVars(ssa);
    return ssa.map((s): SsaStatement => {
        switch (s.type) {
            case "def":
                return { ...s, expr: renameInputs(s.expr, defined) };
            case "branch":
            case "assert":
                return { ...s, condition: renameInputs(s.condition, defined) };
        }
    });
}
