/**
 * Entry-point filtering
 *
 * Offers the heuristic entry points of non-shell languages to an external
 * EntryPointFilter and unmarks the ones it rejects. When the filter throws,
 * every candidate stays marked.
 */

import { errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import { isPrivateName, isTestFile, isTestName } from '../parser/python/entry-points';
import type { SymbolTables } from '../parser/symbol-table';
import type { CodeSymbol } from '../parser/types';
import type { EntryPointCandidate, EntryPointFilter } from './types';

const log = createLogger('entry-points');

/**
 * qualified name -> number of distinct symbols calling it
 */
export function buildCallerIndex(tables: SymbolTables): Map<string, number> {
    const callers = new Map<string, number>();
    for (const table of tables.values()) {
        for (const symbol of table.getAllSymbols()) {
            for (const target of new Set(symbol.resolvedCalls)) {
                callers.set(target, (callers.get(target) ?? 0) + 1);
            }
        }
    }
    return callers;
}

export function toCandidate(symbol: CodeSymbol, callerIndex: Map<string, number>): EntryPointCandidate {
    const metadata = symbol.metadata;
    const python = metadata.kind === 'python' ? metadata : null;

    return {
        qualifiedName: symbol.qualifiedName,
        name: symbol.name,
        language: symbol.language,
        filePath: symbol.filePath,
        documentation: symbol.documentation,
        usesCliParsing: python?.usesCliParsing ?? false,
        calledInMainGuard: python?.calledInMainGuard ?? false,
        isTest: isTestName(symbol.name) || isTestFile(symbol.filePath),
        isPrivate: isPrivateName(symbol.name),
        callerCount: callerIndex.get(symbol.qualifiedName) ?? 0,
        calleeCount: new Set(symbol.resolvedCalls).size,
    };
}

/**
 * Heuristic entry points the filter may veto: everything marked except
 * shell scripts.
 */
export function collectCandidates(tables: SymbolTables): CodeSymbol[] {
    const candidates: CodeSymbol[] = [];
    for (const [language, table] of tables) {
        if (language === 'shell') continue;
        for (const symbol of table.getAllSymbols()) {
            if (symbol.isEntryPoint) candidates.push(symbol);
        }
    }
    return candidates;
}

/**
 * Apply the filter. Returns the number of entry points unmarked.
 */
export async function applyEntryPointFilter(tables: SymbolTables, filter: EntryPointFilter): Promise<number> {
    const symbols = collectCandidates(tables);
    if (symbols.length === 0) return 0;

    const callerIndex = buildCallerIndex(tables);
    const candidates = symbols.map(symbol => toCandidate(symbol, callerIndex));

    let accepted: EntryPointCandidate[];
    try {
        accepted = await filter.filter(candidates);
    } catch (error) {
        log.warn('Entry-point filter failed, keeping all candidates', {
            candidates: candidates.length,
            reason: errorMessage(error),
        });
        return 0;
    }

    const keep = new Set(accepted.map(candidate => candidate.qualifiedName));
    let removed = 0;
    for (const symbol of symbols) {
        if (!keep.has(symbol.qualifiedName)) {
            symbol.isEntryPoint = false;
            removed++;
        }
    }

    log.info('Entry points filtered', { candidates: candidates.length, kept: candidates.length - removed });
    return removed;
}
