/**
 * Symbol Diff
 *
 * Compares two symbol universes by qualified name. A symbol is modified when
 * its metadata, its set of resolved calls or its documentation differ. Line
 * numbers and file paths do not count: code that only moved is unchanged.
 */

import { isDeepStrictEqual } from 'util';
import type { CodeSymbol, SymbolUniverse } from '../parser/types';

export type SymbolChangeType = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface SymbolChange {
    qualifiedName: string;
    changeType: SymbolChangeType;
    before?: CodeSymbol;
    after?: CodeSymbol;
}

export type DiffSide = 'before' | 'after';

export function sameCallSet(a: readonly string[], b: readonly string[]): boolean {
    const left = new Set(a);
    const right = new Set(b);
    if (left.size !== right.size) return false;
    for (const call of left) {
        if (!right.has(call)) return false;
    }
    return true;
}

export function symbolsDiffer(before: CodeSymbol, after: CodeSymbol): boolean {
    return !isDeepStrictEqual(before.metadata, after.metadata)
        || !sameCallSet(before.resolvedCalls, after.resolvedCalls)
        || before.documentation !== after.documentation;
}

/**
 * Changes keyed by qualified name: modified and deleted symbols in
 * before-side order, then added ones in after-side order.
 */
export function diffSymbols(before: SymbolUniverse, after: SymbolUniverse): Map<string, SymbolChange> {
    const changes = new Map<string, SymbolChange>();

    for (const [qualifiedName, previous] of before) {
        const current = after.get(qualifiedName);
        if (!current) {
            changes.set(qualifiedName, { qualifiedName, changeType: 'DELETED', before: previous });
        } else if (symbolsDiffer(previous, current)) {
            changes.set(qualifiedName, { qualifiedName, changeType: 'MODIFIED', before: previous, after: current });
        }
    }

    for (const [qualifiedName, current] of after) {
        if (!before.has(qualifiedName)) {
            changes.set(qualifiedName, { qualifiedName, changeType: 'ADDED', after: current });
        }
    }

    return changes;
}

const RELEVANT_CHANGES: Record<DiffSide, ReadonlySet<SymbolChangeType>> = {
    before: new Set<SymbolChangeType>(['MODIFIED', 'DELETED']),
    after: new Set<SymbolChangeType>(['MODIFIED', 'ADDED']),
};

/**
 * Set hasChanges on the symbols of one side that the changes concern.
 * Returns how many were stamped.
 */
export function stampChanges(universe: SymbolUniverse, changes: Map<string, SymbolChange>, side: DiffSide): number {
    let stamped = 0;
    for (const change of changes.values()) {
        if (!RELEVANT_CHANGES[side].has(change.changeType)) continue;
        const symbol = universe.get(change.qualifiedName);
        if (symbol) {
            symbol.hasChanges = true;
            stamped++;
        }
    }
    return stamped;
}

export function countChanges(changes: Map<string, SymbolChange>): Record<SymbolChangeType, number> {
    const counts: Record<SymbolChangeType, number> = { ADDED: 0, MODIFIED: 0, DELETED: 0 };
    for (const change of changes.values()) {
        counts[change.changeType]++;
    }
    return counts;
}
