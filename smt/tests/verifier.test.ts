import { afterAll, describe, expect, test } from "@jest/globals";
import { parseProgram } from "../../lang";
import { convert } from "../../ssa";
import { checkEquivalence, shutdownZ3, verifyAssertions } from "..";

// the first query pays for loading the solver
const Z3_TIMEOUT = 60000;

function ssaOf(source: string) {
    return convert(parseProgram(source));
}

afterAll(() => {
    shutdownZ3();
});

describe("verifyAssertions", () => {
    test("proves an assertion that follows from the definitions", async () => {
        const results = await verifyAssertions(ssaOf("x = 10; y = x + 5; verify(y > x); verify(y - 15);"));
        expect(results).toEqual([
            { assertion: "y_1 > x_1", verified: true },
            {
                assertion: "y_1 - 15",
                verified: false,
                error: "counterexample found",
                counterexample: { x_1: "10", y_1: "15" }
            },
        ]);
    }, Z3_TIMEOUT);

    test("refutes the last branch of the example program", async () => {
        const results = await verifyAssertions(ssaOf(`
            x = 10;
            y = x + 5;
            when (x > y) { z = x + y; } otherwise { z = x - y; }
            verify(z > 0);
        `), { timeoutMs: 10000 });
        expect(results).toEqual([{
            assertion: "z_2 > 0",
            verified: false,
            error: "counterexample found",
            counterexample: { x_1: "10", y_1: "15", z_1: "25", z_2: "-5" }
        }]);
    }, Z3_TIMEOUT);

    test("holds for every value of a free variable", async () => {
        const results = await verifyAssertions(ssaOf("s = n + n; verify(s - n == n);"));
        expect(results).toEqual([{ assertion: "s_1 - n == n", verified: true }]);
    }, Z3_TIMEOUT);

    test("a source name spelled like a version is an unconstrained input", async () => {
        const [result] = await verifyAssertions(ssaOf("x = 5; verify(x_1 == 5);"));
        expect(result.assertion).toBe("free!x_1 == 5");
        expect(result.verified).toBe(false);
        expect(Object.keys(result.counterexample ?? {})).toEqual(["x_1", "free!x_1"]);
        expect(result.counterexample?.["x_1"]).toBe("5");
        expect(result.counterexample?.["free!x_1"]).not.toBe("5");
    }, Z3_TIMEOUT);

    test("literals beyond double precision are exact", async () => {
        const results = await verifyAssertions(ssaOf(`
            x = 1000000000000000000000;
            y = 9007199254740993;
            verify(x > 0);
            verify(y - 9007199254740992 == 1);
        `));
        expect(results).toEqual([
            { assertion: "x_1 > 0", verified: true },
            { assertion: "y_1 - 9007199254740992 == 1", verified: true },
        ]);
    }, Z3_TIMEOUT);

    test("no assertions, no results", async () => {
        expect(await verifyAssertions(ssaOf("x = 1;"))).toEqual([]);
    }, Z3_TIMEOUT);
});

describe("checkEquivalence", () => {
    test("same values computed differently", async () => {
        const result = await checkEquivalence(ssaOf("x = a + a;"), ssaOf("x = 2 * a;"));
        expect(result).toEqual({ kind: "equivalent" });
    }, Z3_TIMEOUT);

    test("same shape, different values", async () => {
        const result = await checkEquivalence(ssaOf("x = a + 1;"), ssaOf("x = a - 1;"));
        expect(result.kind).toBe("not-equivalent");
        if (result.kind === "not-equivalent") {
            expect(result.reason).toBe("different values");
            expect(Object.keys(result.counterexample ?? {})).toEqual(["a"]);
        }
    }, Z3_TIMEOUT);

    test("an input spelled like a version is not its own definition", async () => {
        const result = await checkEquivalence(ssaOf("x = x_1 + 1;"), ssaOf("x = x_1 + 2;"));
        expect(result.kind).toBe("not-equivalent");
        if (result.kind === "not-equivalent") {
            expect(result.reason).toBe("different values");
            expect(Object.keys(result.counterexample ?? {})).toEqual(["free!x_1"]);
        }
    }, Z3_TIMEOUT);

    test("stops at the syntactic check", async () => {
        const result = await checkEquivalence(ssaOf("x = 1;"), ssaOf("y = 1;"));
        expect(result).toEqual({ kind: "not-equivalent", reason: "different variables used" });
    }, Z3_TIMEOUT);
});
