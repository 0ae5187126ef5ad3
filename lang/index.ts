export * from "./src/ast";
export * from "./src/build";
export { toComparator } from "./src/comparator";
export type { ComparatorToken } from "./src/comparator";
export { SyntaxError } from "./src/errors";
export { parseProgram, parseTree, miniGrammar } from "./src/parser";
