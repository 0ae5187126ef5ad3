// STATEMENTS

export type Statement = AssignStmt | IfStmt | WhileStmt | ForStmt | AssertStmt;

export type Block = Statement[];

export interface AssignStmt {
    type: "assign";
    name: string;
    expr: Expr;
}
export interface IfStmt {
    type: "if";
    condition: Expr;
    then: Block;
    else: Block;
}
export interface WhileStmt {
    type: "while";
    condition: Expr;
    body: Block;
}
export interface ForStmt {
    type: "for";
    init: AssignStmt;
    condition: Expr;
    update: AssignStmt;
    body: Block;
}
export interface AssertStmt {
    type: "assert";
    condition: Expr;
}


// EXPRESSIONS

export type Expr = NumExpr | VarExpr | BinExpr | CondExpr;

export type BinaryOperation = "add" | "sub" | "mul" | "div";
export type Comparator = ">" | "<" | ">=" | "<=" | "==" | "!=";

export interface NumExpr {
    type: "num";
    value: bigint;
}
export interface VarExpr {
    type: "var";
    name: string;
    /** set on a read that no earlier assignment defines */
    input?: true;
}
export interface BinExpr {
    type: "bin";
    operation: BinaryOperation;
    left: Expr;
    right: Expr;
}
export interface CondExpr {
    type: "cond";
    op: Comparator;
    left: Expr;
    right: Expr;
}
