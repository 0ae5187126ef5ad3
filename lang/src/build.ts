import * as ast from "./ast";
import { ComparatorToken, toComparator } from "./comparator";

// shorthand constructors for producers that build trees in code

export function num(value: number | bigint): ast.NumExpr {
    return { type: "num", value: BigInt(value) };
}

export function v(name: string): ast.VarExpr {
    return { type: "var", name };
}

export function bin(operation: ast.BinaryOperation, left: ast.Expr, right: ast.Expr): ast.BinExpr {
    return { type: "bin", operation, left, right };
}

export function cond(op: ComparatorToken, left: ast.Expr, right: ast.Expr): ast.CondExpr {
    return { type: "cond", op: toComparator(op), left, right };
}

export function assign(name: string, expr: ast.Expr): ast.AssignStmt {
    return { type: "assign", name, expr };
}

export function when(condition: ast.Expr, then: ast.Block, otherwise: ast.Block = []): ast.IfStmt {
    return { type: "if", condition, then, else: otherwise };
}

export function repeat(condition: ast.Expr, body: ast.Block): ast.WhileStmt {
    return { type: "while", condition, body };
}

export function iterate(init: ast.AssignStmt, condition: ast.Expr, update: ast.AssignStmt, body: ast.Block): ast.ForStmt {
    return { type: "for", init, condition, update, body };
}

export function verify(condition: ast.Expr): ast.AssertStmt {
    return { type: "assert", condition };
}
