import { Expr } from "../../lang";

export type SsaStatement = DefStmt | BranchStmt | AssertStmt;

export type BranchKind = "if" | "while" | "for";

export interface DefStmt {
    type: "def";
    name: string; // versioned name, e.g. x_3
    expr: Expr;
}
export interface BranchStmt {
    type: "branch";
    kind: BranchKind;
    condition: Expr;
}
export interface AssertStmt {
    type: "assert";
    condition: Expr;
}
