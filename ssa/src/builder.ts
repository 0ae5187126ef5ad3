import { AssignStmt, Block, Expr, Statement } from "../../lang";
import { createContext, newVersion, SsaContext } from "./context";
import { rewrite } from "./rewrite";
import { BranchKind, SsaStatement } from "./ssa";

/**
 * Converts a program into a linear SSA stream.
 *
 * Statements are visited in source order against one environment; there is no
 * phi merge. Bodies of `if`/`while`/`for` are flattened one level: only their
 * direct assignments are converted, nested control statements and assertions
 * inside a body are not visited.
 */
export function convert(program: readonly Statement[]): SsaStatement[]
{
    const ctx = createContext();
    for (const stmt of program) {
        convertStatement(ctx, stmt);
    }
    return ctx.out;
}

export function convertStatement(ctx: SsaContext, stmt: Statement): void
{
    switch (stmt.type) {
        case "assign":
            convertAssignment(ctx, stmt);
            break;
        case "if":
            emitBranch(ctx, "if", stmt.condition);
            convertDirectAssignments(ctx, stmt.then);
            convertDirectAssignments(ctx, stmt.else);
            break;
        case "while":
            emitBranch(ctx, "while", stmt.condition);
            convertDirectAssignments(ctx, stmt.body);
            break;
        case "for":
            convertAssignment(ctx, stmt.init);
            emitBranch(ctx, "for", stmt.condition);
            convertDirectAssignments(ctx, stmt.body);
            convertAssignment(ctx, stmt.update);
            break;
        case "assert":
            ctx.out.push({ type: "assert", condition: rewrite(stmt.condition, ctx.env) });
            break;
        default:
            // unknown statements from untyped producers are skipped
            break;
    }
}

function convertAssignment(ctx: SsaContext, stmt: AssignStmt): void
{
    // the right-hand side sees the previous version: x = x + 1 gives x_2 := x_1 + 1
    const expr = rewrite(stmt.expr, ctx.env);
    const name = newVersion(ctx, stmt.name);
    ctx.out.push({ type: "def", name, expr });
}

function convertDirectAssignments(ctx: SsaContext, block: Block): void
{
    for (const s of block) {
        if (s.type === "assign") {
            convertAssignment(ctx, s);
        }
    }
}

function emitBranch(ctx: SsaContext, kind: BranchKind, condition: Expr): void
{
    ctx.out.push({ type: "branch", kind, condition: rewrite(condition, ctx.env) });
}
