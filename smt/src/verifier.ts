import { Arith, Bool, Context, init, Model, Solver } from "z3-solver";
import { BinExpr, Expr } from "../../lang";
import { compare, definedVars, formatExpr, SsaStatement } from "../../ssa";
import { collectNames, separateInputs } from "./names";

type Z3Api = Awaited<ReturnType<typeof init>>;

let z3anchor: Z3Api | null = null;
let z3Context: Context | null = null;

export async function initZ3(): Promise<Context> {
    if (!z3Context) {
        z3anchor = await init();
        z3Context = z3anchor.Context("main");
    }
    return z3Context;
}

// stops the solver's worker threads; the next call to initZ3 starts a fresh context
export function shutdownZ3(): void {
    if (z3anchor) {
        z3anchor.em.PThread.terminateAllThreads();
    }
    z3anchor = null;
    z3Context = null;
}

export interface VerifierOptions {
    /** per-query solver timeout */
    timeoutMs?: number;
    /** log every query sent to the solver */
    verbose?: boolean;
}

export type Counterexample = Record<string, string>;

export interface AssertionResult {
    assertion: string;
    verified: boolean;
    error?: string;
    counterexample?: Counterexample;
}

export type EquivalenceResult =
    | { kind: "equivalent" }
    | { kind: "not-equivalent"; reason: string; counterexample?: Counterexample }
    | { kind: "unknown" };

// resolves an SSA or free name to its solver constant
type Lookup = (name: string) => Arith;

function constants(z3: Context, prefix = ""): { lookup: Lookup; env: Map<string, Arith> } {
    const env = new Map<string, Arith>();
    const lookup = (name: string): Arith => {
        let c = env.get(name);
        if (!c) {
            c = z3.Int.const(prefix + name);
            env.set(name, c);
        }
        return c;
    };
    return { lookup, env };
}

function encodeBinary(e: BinExpr, left: Arith, right: Arith): Arith {
    switch (e.operation) {
        case "add": return left.add(right);
        case "sub": return left.sub(right);
        case "mul": return left.mul(right);
        case "div": return left.div(right);
    }
}

function encodeExpr(z3: Context, e: Expr, lookup: Lookup): Arith {
    switch (e.type) {
        case "num":
            return z3.Int.val(e.value);
        case "var":
            return lookup(e.name);
        case "bin":
            return encodeBinary(e, encodeExpr(z3, e.left, lookup), encodeExpr(z3, e.right, lookup));
        case "cond":
            return z3.If(encodeCondition(z3, e, lookup), z3.Int.val(1), z3.Int.val(0));
    }
}

function encodeCondition(z3: Context, e: Expr, lookup: Lookup): Bool {
    if (e.type !== "cond") {
        return encodeExpr(z3, e, lookup).neq(0);
    }
    const left = encodeExpr(z3, e.left, lookup);
    const right = encodeExpr(z3, e.right, lookup);
    switch (e.op) {
        case "==": return left.eq(right);
        case "!=": return left.neq(right);
        case ">": return left.gt(right);
        case "<": return left.lt(right);
        case ">=": return left.ge(right);
        case "<=": return left.le(right);
    }
}

// branches record a condition only; in the linear model they constrain nothing
function encodeDefinitions(z3: Context, ssa: readonly SsaStatement[], lookup: Lookup): Bool[] {
    const definitions: Bool[] = [];
    for (const s of ssa) {
        if (s.type === "def") {
            definitions.push(lookup(s.name).eq(encodeExpr(z3, s.expr, lookup)));
        }
    }
    return definitions;
}

function createSolver(z3: Context, options: VerifierOptions): Solver {
    const solver = new z3.Solver();
    if (options.timeoutMs !== undefined) {
        solver.set("timeout", options.timeoutMs);
    }
    return solver;
}

function readModel(z3: Context, model: Model, names: Iterable<string>, lookup: Lookup): Counterexample {
    const counterexample: Counterexample = {};
    for (const name of names) {
        const value = model.eval(lookup(name), true);
        // numerals print as decimals, not as (- 5)
        counterexample[name] = z3.isIntVal(value) ? value.asString() : value.toString();
    }
    return counterexample;
}

async function proveTheorem(
    z3: Context,
    solver: Solver,
    theorem: Bool,
    options: VerifierOptions
): Promise<{ result: "sat" | "unsat" | "unknown"; model?: Model }> {
    if (options.verbose) {
        console.log("Z3 theorem:", theorem.toString());
    }

    // the theorem holds when its negation has no model
    solver.add(z3.Not(theorem));

    const result = await solver.check();

    if (result === "sat") {
        return { result, model: solver.model() };
    }
    return { result };
}

/**
 * Checks each assertion of the stream against all of its definitions.
 * A failed assertion comes back with the values of every name the stream
 * mentions in the refuting model.
 */
export async function verifyAssertions(
    ssa: readonly SsaStatement[],
    options: VerifierOptions = {}
): Promise<AssertionResult[]> {
    const z3 = await initZ3();
    const { lookup } = constants(z3);
    const encoded = separateInputs(ssa);
    const definitions = encodeDefinitions(z3, encoded, lookup);
    const names = collectNames(encoded);
    const results: AssertionResult[] = [];

    for (const s of encoded) {
        if (s.type !== "assert") continue;

        const assertion = formatExpr(s.condition);
        const solver = createSolver(z3, options);
        solver.add(...definitions);
        const { result, model } = await proveTheorem(z3, solver, encodeCondition(z3, s.condition, lookup), options);

        if (result === "unsat") {
            results.push({ assertion, verified: true });
        } else if (model) {
            results.push({
                assertion,
                verified: false,
                error: "counterexample found",
                counterexample: readModel(z3, model, names, lookup)
            });
        } else {
            results.push({ assertion, verified: false, error: `solver returned ${result}` });
        }
    }

    return results;
}

/**
 * Semantic equivalence behind the syntactic pre-filter: both streams are
 * encoded over separate namespaces that share the free variables, and the
 * solver looks for inputs on which some defined name differs.
 */
export async function checkEquivalence(
    a: readonly SsaStatement[],
    b: readonly SsaStatement[],
    options: VerifierOptions = {}
): Promise<EquivalenceResult> {
    const verdict = compare(a, b);
    if (verdict.kind === "not-equivalent") {
        return verdict;
    }

    const defined = [...definedVars(a)];
    if (defined.length === 0) {
        return { kind: "equivalent" };
    }

    const z3 = await initZ3();
    const free = constants(z3);
    const namespaced = (stream: readonly SsaStatement[], prefix: string): Lookup => {
        const names = definedVars(stream);
        const own = constants(z3, prefix);
        return name => names.has(name) ? own.lookup(name) : free.lookup(name);
    };
    const encodedA = separateInputs(a);
    const encodedB = separateInputs(b);
    const left = namespaced(encodedA, "a!");
    const right = namespaced(encodedB, "b!");

    const solver = createSolver(z3, options);
    solver.add(...encodeDefinitions(z3, encodedA, left), ...encodeDefinitions(z3, encodedB, right));
    const same = z3.And(...defined.map(name => left(name).eq(right(name))));
    const { result, model } = await proveTheorem(z3, solver, same, options);

    if (result === "unsat") {
        return { kind: "equivalent" };
    }
    if (model) {
        return {
            kind: "not-equivalent",
            reason: "different values",
            counterexample: readModel(z3, model, free.env.keys(), free.lookup)
        };
    }
    return { kind: "unknown" };
}
