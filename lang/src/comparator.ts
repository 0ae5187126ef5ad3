import { Comparator } from "./ast";
import { SyntaxError } from "./errors";

const comparators: readonly Comparator[] = [">", "<", ">=", "<=", "==", "!="];

// token-like wrappers (a lexer token, a parse node) expose the symbol as `value`
export type ComparatorToken = string | { value: string };

function isComparator(symbol: string): symbol is Comparator {
    return comparators.some(c => c === symbol);
}

export function toComparator(raw: ComparatorToken): Comparator
{
    const symbol = typeof raw === "string" ? raw : raw.value;
    if (!isComparator(symbol)) {
        throw new SyntaxError(`unknown comparator '${symbol}'`);
    }
    return symbol;
}
