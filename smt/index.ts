export { verifyAssertions, checkEquivalence, initZ3, shutdownZ3 } from "./src/verifier";
export type { VerifierOptions, AssertionResult, EquivalenceResult, Counterexample } from "./src/verifier";
export { toSmtLib, printTerm, printFormula } from "./src/smtlib";
export { collectNames, separateInputs, INPUT_PREFIX } from "./src/names";
