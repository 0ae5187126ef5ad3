import { SsaStatement } from "./ssa";

export type InequivalenceReason =
    | "different variables used"
    | "different control flow"
    | "different assertions";

export type Verdict =
    | { kind: "equivalent" }
    | { kind: "not-equivalent"; reason: InequivalenceReason };

export function definedVars(ssa: readonly SsaStatement[]): Set<string>
{
    const names = new Set<string>();
    for (const s of ssa) {
        if (s.type === "def") {
            names.add(s.name);
        }
    }
    return names;
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean
{
    if (a.size !== b.size) return false;
    for (const name of a) {
        if (!b.has(name)) return false;
    }
    return true;
}

function countIfs(ssa: readonly SsaStatement[]): number
{
    return ssa.filter(s => s.type === "branch" && s.kind === "if").length;
}

function countAsserts(ssa: readonly SsaStatement[]): number
{
    return ssa.filter(s => s.type === "assert").length;
}

/**
 * Syntactic pre-filter over two SSA streams. Only the set of defined names,
 * the number of `if` branches and the number of assertions are compared;
 * right-hand sides are never looked at, so streams that compute different
 * values over the same names are reported equivalent.
 */
export function compare(a: readonly SsaStatement[], b: readonly SsaStatement[]): Verdict
{
    if (!sameSet(definedVars(a), definedVars(b))) {
        return { kind: "not-equivalent", reason: "different variables used" };
    }
    if (countIfs(a) !== countIfs(b)) {
        return { kind: "not-equivalent", reason: "different control flow" };
    }
    if (countAsserts(a) !== countAsserts(b)) {
        return { kind: "not-equivalent", reason: "different assertions" };
    }
    return { kind: "equivalent" };
}

export function describeVerdict(verdict: Verdict): string
{
    if (verdict.kind === "equivalent") {
        return "Programs are equivalent";
    }
    const reason = verdict.reason.charAt(0).toUpperCase() + verdict.reason.slice(1);
    return `Programs are not equivalent: ${reason}`;
}
