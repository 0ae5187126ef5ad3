export { buildReport, describeAssertion, describeEquivalence, describeCounterexample, MENU, RULE } from "./src/report";
export type { ReportOptions } from "./src/report";
export { EXAMPLE_PROGRAM, EXAMPLE_PROGRAM_2 } from "./src/examples";
export type { ProgramSource } from "./src/examples";
export { parseArgs } from "./src/main";
