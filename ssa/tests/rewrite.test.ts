import { describe, expect, test } from "@jest/globals";
import { bin, cond, Expr, num, v } from "../../lang";
import { current, newVersion, createContext, formatExpr, rewrite } from "..";

describe("rewrite", () => {
    const env = new Map([["x", "x_2"], ["y", "y_1"]]);

    test("numbers are unchanged", () => {
        const n = num(7);
        expect(rewrite(n, env)).toBe(n);
    });

    test("variables resolve through the environment", () => {
        expect(rewrite(v("x"), env)).toEqual(v("x_2"));
        expect(rewrite(v("free"), env)).toEqual({ type: "var", name: "free", input: true });
    });

    test("operators and comparators are kept", () => {
        expect(rewrite(bin("div", v("x"), bin("sub", v("y"), num(1))), env))
            .toEqual(bin("div", v("x_2"), bin("sub", v("y_1"), num(1))));
        expect(rewrite(cond({ value: "<=" }, v("x"), v("y")), env))
            .toEqual({ type: "cond", op: "<=", left: v("x_2"), right: v("y_1") });
    });

    test("wrapped comparators from untyped trees are unwrapped", () => {
        const e: Expr = JSON.parse('{"type":"cond","op":{"value":">"},"left":{"type":"var","name":"x"},"right":{"type":"var","name":"y"}}');
        expect(rewrite(e, env)).toEqual(cond(">", v("x_2"), v("y_1")));
        expect(formatExpr(rewrite(e, env))).toBe("x_2 > y_1");
    });

    test("does not modify its input", () => {
        const e = bin("add", v("x"), v("y"));
        rewrite(e, env);
        expect(e).toEqual(bin("add", v("x"), v("y")));
    });

    test("unknown expression tags pass through", () => {
        const call: Expr = JSON.parse('{"type":"call","name":"f","args":[]}');
        expect(rewrite(call, env)).toBe(call);
    });
});

describe("versions", () => {
    test("are issued per name starting at one", () => {
        const ctx = createContext();
        expect(newVersion(ctx, "a")).toBe("a_1");
        expect(newVersion(ctx, "b")).toBe("b_1");
        expect(newVersion(ctx, "a")).toBe("a_2");
        expect(current(ctx.env, "a")).toBe("a_2");
        expect(current(ctx.env, "c")).toBe("c");
    });
});
