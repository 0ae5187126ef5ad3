import { SsaStatement } from "./ssa";

/**
 * Mutable state of a single conversion run. Created by {@link createContext}
 * and never shared between runs, so independent programs cannot see each
 * other's versions or bindings.
 */
export interface SsaContext {
    /** highest version issued per source name */
    counter: Map<string, number>;
    /** source name -> current versioned name */
    env: Map<string, string>;
    out: SsaStatement[];
}

export function createContext(): SsaContext {
    return { counter: new Map(), env: new Map(), out: [] };
}

export function newVersion(ctx: SsaContext, name: string): string {
    const n = (ctx.counter.get(name) ?? 0) + 1;
    ctx.counter.set(name, n);
    const versioned = `${name}_${n}`;
    ctx.env.set(name, versioned);
    return versioned;
}

// a name never assigned is a free (parameter) reference and keeps its source spelling
export function current(env: ReadonlyMap<string, string>, name: string): string {
    return env.get(name) ?? name;
}
