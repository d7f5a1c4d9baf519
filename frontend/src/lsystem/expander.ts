/**
 * Sequence expansion for deterministic context-free L-systems.
 */

import type { LSymbol, RuleEntry, RuleTable } from '../types/lsystem';

/**
 * Build the lookup table used during expansion.
 * When several entries share a trigger the last one defined wins.
 * Entries with an empty trigger are skipped; longer triggers use their first character.
 */
export function buildRuleTable(rules: ReadonlyArray<Pick<RuleEntry, 'trigger' | 'replacement'>>): RuleTable {
    const table = new Map<LSymbol, string>();
    for (const rule of rules) {
        const trigger = [...rule.trigger][0];
        if (!trigger) continue;
        table.set(trigger, rule.replacement);
    }
    return table;
}

/**
 * Ids of rules that never take effect because a later rule shares their trigger.
 */
export function shadowedRuleIds(rules: ReadonlyArray<RuleEntry>): Set<string> {
    const lastForTrigger = new Map<LSymbol, string>();
    for (const rule of rules) {
        const trigger = [...rule.trigger][0];
        if (trigger) lastForTrigger.set(trigger, rule.id);
    }
    const shadowed = new Set<string>();
    for (const rule of rules) {
        const trigger = [...rule.trigger][0];
        if (trigger && lastForTrigger.get(trigger) !== rule.id) shadowed.add(rule.id);
    }
    return shadowed;
}

function normalizeIterations(iterations: number): number {
    if (!Number.isFinite(iterations)) return 0;
    return Math.max(0, Math.floor(iterations));
}

/**
 * Apply one rewriting round to a sequence.
 */
export function rewriteOnce(sequence: string, rules: RuleTable): string {
    let next = '';
    for (const symbol of sequence) {
        next += rules.get(symbol) ?? symbol;
    }
    return next;
}

/**
 * Expand the axiom for the given number of rounds.
 * Only the current round is kept alive; earlier rounds are dropped as soon
 * as the next one is built. Growth is not bounded here, callers guard it
 * with predictLengths().
 */
export function expand(axiom: string, rules: RuleTable, iterations: number): string {
    const rounds = normalizeIterations(iterations);
    if (rules.size === 0) return axiom;

    let current = axiom;
    for (let i = 0; i < rounds; i++) {
        const next = rewriteOnce(current, rules);
        // Fixed point reached, further rounds would not change anything
        if (next === current) break;
        current = next;
    }
    return current;
}

export interface ExpansionBudget {
    /** Longest sequence any round may produce */
    maxLength: number;
    /** Most symbols the expander may read across all rounds */
    maxWork: number;
}

export interface LengthPrediction {
    /** Lengths of the rounds actually simulated; index 0 is the axiom */
    lengths: number[];
    /** Length after every requested round; a lower bound when over budget */
    finalLength: number;
    /** Symbols read by expand() to reach the final round */
    work: number;
    overBudget: 'length' | 'work' | null;
}

const UNBOUNDED: ExpansionBudget = { maxLength: Infinity, maxWork: Infinity };

type SymbolCounts = Map<LSymbol, number>;

function countSymbols(sequence: string): SymbolCounts {
    const counts: SymbolCounts = new Map();
    for (const symbol of sequence) {
        counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
    }
    return counts;
}

function totalOf(counts: SymbolCounts): number {
    let sum = 0;
    counts.forEach((n) => { sum += n; });
    return sum;
}

function rewriteCounts(counts: SymbolCounts, rules: RuleTable): SymbolCounts {
    const next: SymbolCounts = new Map();
    counts.forEach((count, symbol) => {
        const replacement = rules.get(symbol) ?? symbol;
        for (const produced of replacement) {
            next.set(produced, (next.get(produced) ?? 0) + count);
        }
    });
    return next;
}

function countsKey(counts: SymbolCounts): string {
    return JSON.stringify([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Every symbol present rewrites to itself, so expand() stops here */
function isStable(counts: SymbolCounts, rules: RuleTable): boolean {
    for (const symbol of counts.keys()) {
        const replacement = rules.get(symbol);
        if (replacement !== undefined && replacement !== symbol) return false;
    }
    return true;
}

function sum(values: ReadonlyArray<number>): number {
    return values.reduce((acc, n) => acc + n, 0);
}

/**
 * Predict sequence lengths from per-symbol counts, without materializing
 * anything. Simulation stops as soon as the budget is exceeded, once the
 * sequence is stable, or once the counts repeat; in the last case the
 * remaining rounds follow the cycle and are summed in closed form. The
 * number of rounds simulated is therefore independent of `iterations`.
 */
export function predictLengths(
    axiom: string,
    rules: RuleTable,
    iterations: number,
    budget: ExpansionBudget = UNBOUNDED
): LengthPrediction {
    const rounds = normalizeIterations(iterations);

    let counts = countSymbols(axiom);
    let length = totalOf(counts);
    const lengths = [length];
    let work = 0;

    const result = (finalLength: number, overBudget: LengthPrediction['overBudget']): LengthPrediction =>
        ({ lengths, finalLength, work, overBudget });

    if (length > budget.maxLength) return result(length, 'length');

    // Round index at which each count vector was first seen
    const seen = new Map<string, number>([[countsKey(counts), 0]]);

    for (let done = 0; done < rounds; ) {
        if (isStable(counts, rules)) break;

        work += length;
        if (work > budget.maxWork) return result(length, 'work');

        counts = rewriteCounts(counts, rules);
        length = totalOf(counts);
        lengths.push(length);
        done++;
        if (length > budget.maxLength) return result(length, 'length');

        const key = countsKey(counts);
        const start = seen.get(key);
        if (start === undefined) {
            seen.set(key, done);
            continue;
        }

        // Lengths repeat with this period from `start` on
        const period = done - start;
        const cycle = lengths.slice(start, done);
        const remaining = rounds - done;
        const rest = remaining % period;
        work += Math.floor(remaining / period) * sum(cycle) + sum(cycle.slice(0, rest));
        const finalLength = lengths[start + rest];
        return result(finalLength, work > budget.maxWork ? 'work' : null);
    }

    return result(length, null);
}
