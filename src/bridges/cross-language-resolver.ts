/**
 * Cross-Language Resolver
 *
 * Runs every registered bridge, merges their references and appends the
 * targets to the source symbols' resolvedCalls. A bridge that throws is
 * recorded as a warning and the others still run.
 */

import type { AnalysisWarning } from '../common/errors';
import { errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import type { SymbolTables } from '../parser/symbol-table';
import type { CrossReferences, LanguageBridge } from './types';

const log = createLogger('bridges');

export class CrossLanguageResolver {
    private readonly bridges: LanguageBridge[] = [];
    private warnings: AnalysisWarning[] = [];

    constructor(bridges: LanguageBridge[] = []) {
        for (const bridge of bridges) {
            this.registerBridge(bridge);
        }
    }

    registerBridge(bridge: LanguageBridge): void {
        this.bridges.push(bridge);
        log.debug('Registered bridge', { bridge: bridge.name });
    }

    /**
     * Merged references of all bridges, in registration order.
     */
    resolveCrossLanguageCalls(tables: SymbolTables): CrossReferences {
        const merged: CrossReferences = new Map();

        for (const bridge of this.bridges) {
            let refs: CrossReferences;
            try {
                refs = bridge.resolve(tables);
            } catch (error) {
                const warning: AnalysisWarning = { kind: 'bridge', source: bridge.name, message: errorMessage(error) };
                log.warn('Bridge failed', { bridge: bridge.name, reason: warning.message });
                this.warnings.push(warning);
                continue;
            }

            for (const [source, targets] of refs) {
                merged.set(source, [...(merged.get(source) ?? []), ...targets]);
            }
            log.debug('Bridge resolved', { bridge: bridge.name, sources: refs.size });
        }

        return merged;
    }

    /**
     * Append cross-language targets to resolvedCalls of every symbol named
     * as a source, in any table.
     */
    applyCrossReferences(tables: SymbolTables, refs: CrossReferences): number {
        let applied = 0;
        for (const table of tables.values()) {
            for (const symbol of table.getAllSymbols()) {
                const targets = refs.get(symbol.qualifiedName);
                if (!targets) continue;
                symbol.resolvedCalls.push(...targets);
                applied += targets.length;
            }
        }
        return applied;
    }

    /**
     * Resolve and apply in one step.
     */
    run(tables: SymbolTables): CrossReferences {
        const refs = this.resolveCrossLanguageCalls(tables);
        const applied = this.applyCrossReferences(tables, refs);
        log.info('Cross-language resolution complete', { bridges: this.bridges.length, references: applied });
        return refs;
    }

    takeWarnings(): AnalysisWarning[] {
        const taken = this.warnings;
        this.warnings = [];
        return taken;
    }
}
