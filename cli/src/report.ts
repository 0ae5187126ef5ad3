import { parseProgram, parseTree } from "../../lang";
import { compare, convert, describeVerdict, format } from "../../ssa";
import { AssertionResult, checkEquivalence, Counterexample, EquivalenceResult, verifyAssertions, VerifierOptions } from "../../smt";
import { ProgramSource } from "./examples";

export const RULE = "-".repeat(40);

export interface ReportOptions extends VerifierOptions {
    /** run the Z3 equivalence check after the syntactic one */
    smt?: boolean;
}

export const MENU = [
    "Program Analysis Options:",
    RULE,
    "1. Input Program",
    "2. Parse Tree",
    "3. Abstract Syntax Tree (AST)",
    "4. Static Single Assignment (SSA) Form",
    "5. Verify Program (SMT)",
    "6. Check Program Equivalence",
    "0. Show this menu",
    RULE,
];

function section(title: string): string[] {
    return ["", `${title}:`, RULE];
}

export function describeCounterexample(counterexample: Counterexample): string {
    return Object.entries(counterexample).map(([name, value]) => `${name} = ${value}`).join(", ");
}

export function describeAssertion(result: AssertionResult): string {
    if (result.verified) {
        return `✅ assert(${result.assertion}) holds`;
    }
    const detail = result.counterexample
        ? `counterexample: ${describeCounterexample(result.counterexample)}`
        : result.error ?? "not verified";
    return `❌ assert(${result.assertion}) fails; ${detail}`;
}

export function describeEquivalence(result: EquivalenceResult): string {
    switch (result.kind) {
        case "equivalent":
            return "SMT: programs compute the same values";
        case "not-equivalent":
            return result.counterexample
                ? `SMT: ${result.reason}; counterexample: ${describeCounterexample(result.counterexample)}`
                : `SMT: ${result.reason}`;
        case "unknown":
            return "SMT: unknown";
    }
}

/**
 * Renders the sections picked by `choice` (digits 1-6, in any order and
 * combination) for the first program; section 6 also needs the second one.
 */
export async function buildReport(
    choice: string,
    first: ProgramSource,
    second: ProgramSource,
    options: ReportOptions = {}
): Promise<string[]> {
    if (choice.includes("0")) {
        return MENU;
    }

    const lines: string[] = [];

    if (choice.includes("1")) {
        lines.push(...section("Input Program"), first.source.trimEnd());
    }

    if (choice.includes("2")) {
        lines.push(...section("Parse Tree"), parseTree(first.source));
    }

    const ast = parseProgram(first.source);
    const ssa = convert(ast);

    if (choice.includes("3")) {
        lines.push(...section("Abstract Syntax Tree (AST)"), JSON.stringify(ast, null, 2));
    }

    if (choice.includes("4")) {
        lines.push(...section("Static Single Assignment (SSA) Form"), format(ssa));
    }

    if (choice.includes("5")) {
        lines.push(...section("Program Verification (SMT)"));
        const results = await verifyAssertions(ssa, options);
        if (results.length === 0) {
            lines.push("no assertions");
        }
        lines.push(...results.map(describeAssertion));
    }

    if (choice.includes("6")) {
        const ssa2 = convert(parseProgram(second.source));
        lines.push(
            ...section("Program Equivalence Check"),
            `Second Program (${second.name}):`,
            second.source.trimEnd(),
            "",
            `Program 1 SSA:`,
            format(ssa),
            "",
            `Program 2 SSA:`,
            format(ssa2),
            "",
            "Equivalence Result:"
        );
        const verdict = compare(ssa, ssa2);
        lines.push(describeVerdict(verdict));
        if (options.smt && verdict.kind === "equivalent") {
            lines.push(describeEquivalence(await checkEquivalence(ssa, ssa2, options)));
        }
    }

    return lines;
}
