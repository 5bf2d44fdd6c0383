/**
 * Language Bridge Contract
 *
 * A bridge maps calls written in one language to symbols of another, e.g.
 * a shell `curl -X POST .../analyze` to the Python handler of that route.
 * Bridges run after every language has resolved its own calls.
 */

import type { SymbolTables } from '../parser/symbol-table';

/**
 * Source qualified name -> target qualified names, in discovery order
 */
export type CrossReferences = Map<string, string[]>;

export interface LanguageBridge {
    /** Reported in warnings when the bridge fails */
    readonly name: string;

    canBridge(fromLanguage: string, toLanguage: string): boolean;

    /**
     * Compute cross references. Returns an empty map when a table the bridge
     * needs is absent.
     */
    resolve(tables: SymbolTables): CrossReferences;
}

/**
 * Append `target` to the references of `source`.
 */
export function addReference(refs: CrossReferences, source: string, target: string): void {
    const targets = refs.get(source);
    if (targets) {
        targets.push(target);
    } else {
        refs.set(source, [target]);
    }
}
