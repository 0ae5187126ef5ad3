import { readFileSync } from "fs";
import { join as pathJoin } from "path";
import { ActionDict, Dict, grammar as loadGrammar, MatchResult, Node, Semantics } from "ohm-js";
import * as ast from "./ast";
import { toComparator } from "./comparator";
import { SyntaxError } from "./errors";

export const miniGrammar = loadGrammar(readFileSync(pathJoin(__dirname, "mini.ohm"), "utf-8"));

type ParseResult = ast.Statement[] | ast.Statement | ast.Expr;

function toBinaryOperation(symbol: string): ast.BinaryOperation {
    switch (symbol) {
        case "+": return "add";
        case "-": return "sub";
        case "*": return "mul";
        case "/": return "div";
        default:
            throw new SyntaxError(`unknown operator '${symbol}'`);
    }
}

// left-associative fold of `first (op rest)*`
function foldBinary(first: Node, operators: Node, rest: Node): ast.Expr {
    let acc: ast.Expr = first.parse();
    const n = operators.children.length;

    for (let i = 0; i < n; i++) {
        const operation = toBinaryOperation(operators.child(i).sourceString);
        const rhs: ast.Expr = rest.child(i).parse();
        acc = { type: "bin", operation, left: acc, right: rhs };
    }

    return acc;
}

export const getMiniAst: ActionDict<ParseResult> = {
    // Program = Statement*
    Program(statements: Node) {
        return statements.children.map((s: Node) => s.parse());
    },
    // Block = "{" Statement* "}"
    Block(left_brace: Node, statements: Node, right_brace: Node) {
        return statements.children.map((s: Node) => s.parse());
    },

    // STATEMENTS
    // Assignment = name "=" Expr ";"
    Assignment(name: Node, equals: Node, expr: Node, semi: Node) {
        return { type: "assign", name: name.sourceString, expr: expr.parse() } satisfies ast.AssignStmt;
    },
    // When = "when" "(" Expr ")" Block "otherwise" Block
    When(_when: Node, left_paren: Node, condition: Node, right_paren: Node, then: Node, _otherwise: Node, otherwise: Node) {
        return { type: "if", condition: condition.parse(), then: then.parse(), else: otherwise.parse() } satisfies ast.IfStmt;
    },
    // Repeat = "repeat" "(" Expr ")" Block
    Repeat(_repeat: Node, left_paren: Node, condition: Node, right_paren: Node, body: Node) {
        return { type: "while", condition: condition.parse(), body: body.parse() } satisfies ast.WhileStmt;
    },
    // Iterate = "iterate" "(" Assignment Expr ";" Assignment ")" Block
    Iterate(_iterate: Node, left_paren: Node, init: Node, condition: Node, semi: Node, update: Node, right_paren: Node, body: Node) {
        return {
            type: "for",
            init: init.parse(),
            condition: condition.parse(),
            update: update.parse(),
            body: body.parse()
        } satisfies ast.ForStmt;
    },
    // Verify = "verify" "(" Expr ")" ";"
    Verify(_verify: Node, left_paren: Node, condition: Node, right_paren: Node, semi: Node) {
        return { type: "assert", condition: condition.parse() } satisfies ast.AssertStmt;
    },

    // EXPRESSIONS
    // Expr = AddExp comparator AddExp  -- comparison
    Expr_comparison(left: Node, op: Node, right: Node) {
        return { type: "cond", op: toComparator(op.sourceString), left: left.parse(), right: right.parse() } satisfies ast.CondExpr;
    },
    AddExp(first: Node, operators: Node, rest: Node) {
        return foldBinary(first, operators, rest);
    },
    MulExp(first: Node, operators: Node, rest: Node) {
        return foldBinary(first, operators, rest);
    },
    PriExp_paren(left_paren: Node, expr: Node, right_paren: Node) {
        return expr.parse();
    },
    PriExp_number(num: Node) {
        return { type: "num", value: BigInt(num.sourceString) } satisfies ast.NumExpr;
    },
    PriExp_variable(name: Node) {
        return { type: "var", name: name.sourceString } satisfies ast.VarExpr;
    },
};

// concrete syntax tree outline, one rule per line; lexical rules are printed as leaves
export const getMiniTree: ActionDict<string[]> = {
    _nonterminal(...children: Node[]) {
        const indent = "  ".repeat(this.args.depth);
        if (/^[a-z]/.test(this.ctorName)) {
            return [`${indent}${this.ctorName} ${JSON.stringify(this.sourceString)}`];
        }
        const depth: number = this.args.depth + 1;
        return [`${indent}${this.ctorName}`, ...children.flatMap((c: Node): string[] => c.tree(depth))];
    },
    _iter(...children: Node[]) {
        const depth: number = this.args.depth;
        return children.flatMap((c: Node): string[] => c.tree(depth));
    },
    _terminal() {
        return [`${"  ".repeat(this.args.depth)}${JSON.stringify(this.sourceString)}`];
    },
};

export interface MiniSemantics extends Semantics
{
    (match: MatchResult): MiniActions
}
interface MiniActions extends Dict
{
    parse(): ast.Statement[];
    tree(depth: number): string[];
}

export const semantics: MiniSemantics = miniGrammar.createSemantics() as MiniSemantics;
semantics.addOperation<ParseResult>("parse()", getMiniAst);
semantics.addOperation<string[]>("tree(depth)", getMiniTree);

const locationRe = /^Line (?<line>\d+), col (?<col>\d+):/;

function match(source: string): MatchResult
{
    const matchResult = miniGrammar.match(source, "Program");

    if (matchResult.failed()) {
        const groups = (matchResult.shortMessage ?? "").match(locationRe)?.groups;
        const startLine = groups ? parseInt(groups.line, 10) : undefined;
        const startCol = groups ? parseInt(groups.col, 10) : undefined;
        throw new SyntaxError(matchResult.message ?? "syntax error", startLine, startCol);
    }

    return matchResult;
}

// passes the source through the grammar and builds the AST using the semantic action parse()
export function parseProgram(source: string): ast.Statement[]
{
    return semantics(match(source)).parse();
}

export function parseTree(source: string): string
{
    return semantics(match(source)).tree(0).join("\n");
}
