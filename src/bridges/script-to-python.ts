/**
 * Shell to Python Script Bridge
 *
 * Maps interpreter invocations in shell scripts to the Python code they run:
 *     "PYTHON:src/server.py"  -> "src.server.server" (synthetic script symbol)
 *     "PYTHON:tools.report"   -> "tools.report.main"
 * A module without a script symbol or a `main` function is left unresolved.
 */

import * as path from 'path';
import { createLogger } from '../common/logger';
import { moduleNameFor } from '../parser/python/extractor';
import { PYTHON_CALL_PREFIX } from '../parser/shell/commands';
import type { SymbolTable, SymbolTables } from '../parser/symbol-table';
import type { CodeSymbol } from '../parser/types';
import { addReference } from './types';
import type { CrossReferences, LanguageBridge } from './types';

const log = createLogger('bridges:script');

/**
 * Candidate modules for an invocation target. Script paths are tried
 * relative to the project root and then to the calling script's directory;
 * `-m pkg` may also run `pkg/__main__.py`.
 */
export function candidateModules(target: string, callerPath: string): string[] {
    if (target.endsWith('.py')) {
        const fromRoot = path.posix.normalize(target);
        const fromCaller = path.posix.normalize(path.posix.join(path.posix.dirname(callerPath), target));
        return [...new Set([fromRoot, fromCaller])]
            .filter(p => !p.startsWith('../'))
            .map(p => moduleNameFor(p).module);
    }
    return [target, `${target}.__main__`];
}

export class ShellToPythonScriptBridge implements LanguageBridge {
    readonly name = 'ShellToPythonScriptBridge';

    canBridge(fromLanguage: string, toLanguage: string): boolean {
        return fromLanguage === 'shell' && toLanguage === 'python';
    }

    resolve(tables: SymbolTables): CrossReferences {
        const refs: CrossReferences = new Map();
        const pythonTable = tables.get('python');
        const shellTable = tables.get('shell');
        if (!pythonTable || !shellTable) return refs;

        const scripts = this.indexScripts(pythonTable);

        for (const symbol of shellTable.getAllSymbols()) {
            for (const rawCall of symbol.rawCalls) {
                if (!rawCall.startsWith(PYTHON_CALL_PREFIX)) continue;
                const target = rawCall.slice(PYTHON_CALL_PREFIX.length);

                const entry = candidateModules(target, symbol.filePath)
                    .map(module => scripts.get(module) ?? pythonTable.getSymbol(`${module}.main`))
                    .find((found): found is CodeSymbol => found !== undefined);
                if (entry) {
                    addReference(refs, symbol.qualifiedName, entry.qualifiedName);
                    log.debug('Resolved interpreter call', { script: symbol.qualifiedName, call: rawCall, target: entry.qualifiedName });
                }
            }
        }

        return refs;
    }

    /**
     * module -> synthetic script symbol
     */
    private indexScripts(pythonTable: SymbolTable): Map<string, CodeSymbol> {
        const scripts = new Map<string, CodeSymbol>();
        for (const symbol of pythonTable.getAllSymbols()) {
            if (symbol.metadata.kind === 'python' && symbol.metadata.isScript) {
                scripts.set(symbol.metadata.module, symbol);
            }
        }
        return scripts;
    }
}
