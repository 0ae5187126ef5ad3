import { Expr, toComparator } from "../../lang";
import { current } from "./context";

export function rewrite(expr: Expr, env: ReadonlyMap<string, string>): Expr
{
    switch (expr.type) {
        case "num":
            return expr;
        case "var":
            // a read nothing has assigned yet is an input of the program
            return env.has(expr.name)
                ? { type: "var", name: current(env, expr.name) }
                : { type: "var", name: expr.name, input: true };
        case "bin":
            return {
                type: "bin",
                operation: expr.operation,
                left: rewrite(expr.left, env),
                right: rewrite(expr.right, env)
            };
        case "cond":
            // trees read from JSON may still carry a wrapped comparator token
            return {
                type: "cond",
                op: toComparator(expr.op),
                left: rewrite(expr.left, env),
                right: rewrite(expr.right, env)
            };
        default:
            // trees built outside the type system may carry other tags; they pass through
            return expr;
    }
}
