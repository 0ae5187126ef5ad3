import { describe, expect, test } from "@jest/globals";
import { bin, cond, Expr, num, v } from "../../lang";
import { format, formatExpr, formatStatement } from "..";

describe("format", () => {
    test("renders each statement kind", () => {
        expect(format([
            { type: "def", name: "q_1", expr: bin("div", bin("mul", v("a"), num(2)), v("b")) },
            { type: "branch", kind: "while", condition: cond(">=", v("q_1"), num(0)) },
            { type: "branch", kind: "for", condition: cond("!=", v("q_1"), v("a")) },
            { type: "assert", condition: cond("==", v("q_1"), num(4)) },
        ])).toBe([
            "q_1 := a * 2 / b",
            "while q_1 >= 0",
            "for q_1 != a",
            "assert(q_1 == 4)",
        ].join("\n"));
    });

    test("an empty stream is empty text", () => {
        expect(format([])).toBe("");
    });

    test("prints no parentheses", () => {
        expect(formatExpr(bin("mul", bin("add", v("a"), v("b")), v("c")))).toBe("a + b * c");
        expect(formatStatement({ type: "def", name: "t_1", expr: cond("<", bin("sub", num(1), v("x")), num(0)) }))
            .toBe("t_1 := 1 - x < 0");
    });

    test("unknown expressions are printed as JSON", () => {
        const call: Expr = JSON.parse('{"type":"call","name":"f"}');
        expect(formatExpr(call)).toBe('{"type":"call","name":"f"}');
    });
});
