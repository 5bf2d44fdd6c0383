/**
 * HTTP to Python Bridge
 *
 * Maps shell HTTP calls to Python route handlers:
 *     "HTTP:POST:/analyze" -> "src.api.analyze"
 * for handlers registered with decorators such as `@app.post("/analyze")`.
 * Calls with no matching route are left unresolved.
 */

import { createLogger } from '../common/logger';
import { parseHttpCall } from '../parser/shell/commands';
import type { SymbolTable, SymbolTables } from '../parser/symbol-table';
import { addReference } from './types';
import type { CrossReferences, LanguageBridge } from './types';

const log = createLogger('bridges:http');

export function endpointKey(method: string, route: string): string {
    return `${method.toUpperCase()} ${route}`;
}

/**
 * "METHOD PATH" -> handler qualified name
 */
export function buildEndpointIndex(pythonTable: SymbolTable): Map<string, string> {
    const index = new Map<string, string>();
    for (const symbol of pythonTable.getAllSymbols()) {
        if (symbol.metadata.kind !== 'python' || !symbol.metadata.http) continue;
        const { method, route } = symbol.metadata.http;
        index.set(endpointKey(method, route), symbol.qualifiedName);
    }
    return index;
}

export class HttpToPythonBridge implements LanguageBridge {
    readonly name = 'HttpToPythonBridge';

    canBridge(fromLanguage: string, toLanguage: string): boolean {
        return fromLanguage === 'shell' && toLanguage === 'python';
    }

    resolve(tables: SymbolTables): CrossReferences {
        const refs: CrossReferences = new Map();
        const pythonTable = tables.get('python');
        const shellTable = tables.get('shell');
        if (!pythonTable || !shellTable) return refs;

        const endpoints = buildEndpointIndex(pythonTable);
        if (endpoints.size === 0) return refs;
        log.debug('Built endpoint index', { endpoints: endpoints.size });

        for (const symbol of shellTable.getAllSymbols()) {
            for (const rawCall of symbol.rawCalls) {
                const request = parseHttpCall(rawCall);
                if (!request) continue;

                const handler = endpoints.get(endpointKey(request.method, request.path));
                if (handler) {
                    addReference(refs, symbol.qualifiedName, handler);
                    log.debug('Resolved HTTP call', { script: symbol.qualifiedName, call: rawCall, handler });
                }
            }
        }

        return refs;
    }
}
