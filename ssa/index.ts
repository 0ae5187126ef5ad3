export * from "./src/ssa";
export { createContext, newVersion, current } from "./src/context";
export type { SsaContext } from "./src/context";
export { rewrite } from "./src/rewrite";
export { convert, convertStatement } from "./src/builder";
export { format, formatExpr, formatStatement } from "./src/format";
export { compare, definedVars, describeVerdict } from "./src/equivalence";
export type { Verdict, InequivalenceReason } from "./src/equivalence";
