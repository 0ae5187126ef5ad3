#!/usr/bin/env node
import { readFileSync } from "fs";
import { parse as pathParse } from "path";
import { shutdownZ3 } from "../../smt";
import { EXAMPLE_PROGRAM, EXAMPLE_PROGRAM_2, ProgramSource } from "./examples";
import { buildReport, ReportOptions } from "./report";

const USAGE = "usage: ssa-check [--show 123456] [--no-smt] [--timeout ms] [--verbose] [first.mini] [second.mini]";

interface CliArgs {
    choice: string;
    files: string[];
    options: ReportOptions;
}

export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { choice: "123456", files: [], options: { smt: true } };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case "--show":
                args.choice = argv[++i] ?? "";
                if (!/^[0-6]+$/.test(args.choice)) {
                    throw new Error(`--show expects digits 0-6\n${USAGE}`);
                }
                break;
            case "--no-smt":
                args.options.smt = false;
                break;
            case "--timeout": {
                const ms = parseInt(argv[++i] ?? "", 10);
                if (Number.isNaN(ms) || ms <= 0) {
                    throw new Error(`--timeout expects a positive number of milliseconds\n${USAGE}`);
                }
                args.options.timeoutMs = ms;
                break;
            }
            case "--verbose":
                args.options.verbose = true;
                break;
            default:
                if (arg.startsWith("--")) {
                    throw new Error(`unknown option ${arg}\n${USAGE}`);
                }
                args.files.push(arg);
        }
    }

    if (args.files.length > 2) {
        throw new Error(`at most two programs can be given\n${USAGE}`);
    }
    return args;
}

function load(file: string | undefined, fallback: ProgramSource): ProgramSource {
    if (file === undefined) {
        return fallback;
    }
    return { name: pathParse(file).name, source: readFileSync(file, "utf-8") };
}

async function run() {
    const { choice, files, options } = parseArgs(process.argv.slice(2));
    const first = load(files[0], EXAMPLE_PROGRAM);
    const second = load(files[1], EXAMPLE_PROGRAM_2);

    console.log("=".repeat(60));
    console.log(`SSA ANALYSIS: ${first.name}`);
    console.log("=".repeat(60));

    try {
        const lines = await buildReport(choice, first, second, options);
        console.log(lines.join("\n"));
    } finally {
        shutdownZ3();
    }
}

if (require.main === module) {
    run().catch((e: unknown) => {
        console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
        process.exitCode = 1;
    });
}
