/**
 * Symbol Table
 *
 * Per-language container keyed by qualified name. Language analyzers extend
 * it with whatever indexes their resolution pass needs.
 */

import type { CodeSymbol } from './types';

export abstract class SymbolTable {
    readonly symbols = new Map<string, CodeSymbol>();

    constructor(readonly language: string) {}

    /**
     * Insert or replace by qualified name (last write wins).
     */
    addSymbol(symbol: CodeSymbol): void {
        this.symbols.set(symbol.qualifiedName, symbol);
    }

    getSymbol(qualifiedName: string): CodeSymbol | undefined {
        return this.symbols.get(qualifiedName);
    }

    getAllSymbols(): CodeSymbol[] {
        return Array.from(this.symbols.values());
    }

    hasSymbol(qualifiedName: string): boolean {
        return this.symbols.has(qualifiedName);
    }

    get size(): number {
        return this.symbols.size;
    }
}

/**
 * Language name -> merged table, as produced by the orchestrator.
 */
export type SymbolTables = Map<string, SymbolTable>;
