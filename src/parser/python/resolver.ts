/**
 * Python Call Resolver
 *
 * Resolves raw call names to qualified names using the merged symbol table.
 * Strategies run in a fixed order and the first hit wins:
 * 1. Attribute chains with an inferred receiver type
 *    (`obj.m` from local bindings, `self.m` / `cls.m`, `self.attr.m`)
 * 2. Function-scoped imports
 * 3. Constructor calls (`ClassName()`)
 * 4. Module-level imports of the caller's module
 * 5. Functions of the caller's module
 * 6. Dotted calls through an imported prefix (`pkg.mod.func()`)
 *
 * Calls that resolve to nothing are dropped.
 */

import type { PythonMetadata } from '../types';
import type { PythonSymbolTable } from './symbol-table';

const CLASS_RECEIVERS: ReadonlySet<string> = new Set(['self', 'cls']);

function ownValue(record: Record<string, string>, key: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

export class PythonCallResolver {
    constructor(private readonly table: PythonSymbolTable) {}

    /**
     * Recompute resolvedCalls from rawCalls for every symbol in the table.
     */
    public resolveAll(): void {
        for (const symbol of this.table.getAllSymbols()) {
            if (symbol.metadata.kind !== 'python') continue;
            const metadata = symbol.metadata;
            const resolved: string[] = [];
            for (const call of symbol.rawCalls) {
                const target = this.resolve(call, metadata);
                if (target) resolved.push(target);
            }
            symbol.resolvedCalls = resolved;
        }
    }

    /**
     * Resolve one raw call made from a symbol with the given metadata.
     */
    public resolve(call: string, caller: PythonMetadata): string | null {
        if (call.includes('.')) {
            const method = this.resolveAttributeChain(call, caller);
            if (method) return method;
        }

        const localImport = ownValue(caller.functionLocalImports, call);
        if (localImport !== undefined && this.table.hasSymbol(localImport)) {
            return localImport;
        }

        const constructed = this.table.resolveClass(call, caller.module);
        if (constructed) {
            return constructed.methods.get('__init__') ?? constructed.qualifiedName;
        }

        const imported = this.table.getImports(caller.module).get(call);
        if (imported !== undefined && this.table.hasSymbol(imported)) {
            return imported;
        }

        // Bare names only match functions; script symbols share the namespace
        const sameModule = call.includes('.')
            ? this.table.getSymbol(`${caller.module}.${call}`)?.qualifiedName
            : this.table.getFunction(caller.module, call);
        if (sameModule !== undefined) {
            return sameModule;
        }

        return this.resolveByPrefix(call, caller);
    }

    /**
     * Look up the trailing method on the receiver's inferred class.
     *
     * Example:
     *     analyzer = StockAnalyzer()
     *     analyzer.analyze()
     * -> local_bindings: { analyzer: "StockAnalyzer" }
     * -> <module of StockAnalyzer>.StockAnalyzer.analyze
     */
    private resolveAttributeChain(call: string, caller: PythonMetadata): string | null {
        const parts = call.split('.');
        const receiver = parts[0];

        if (CLASS_RECEIVERS.has(receiver) && caller.className !== null) {
            const owner = this.table.getClass(`${caller.module}.${caller.className}`);
            if (!owner) return null;

            if (parts.length === 2) {
                return this.table.findMethod(owner, parts[1]) ?? null;
            }
            if (parts.length === 3) {
                const attribute = this.table.findInstanceAttribute(owner, parts[1]);
                if (!attribute) return null;
                const attributeClass = this.table.resolveClass(attribute.constructorName, attribute.owner.module);
                return attributeClass ? this.table.findMethod(attributeClass, parts[2]) ?? null : null;
            }
            return null;
        }

        const binding = ownValue(caller.localBindings, receiver);
        if (parts.length === 2 && binding !== undefined) {
            const bound = this.table.resolveClass(binding, caller.module);
            if (bound) {
                return this.table.findMethod(bound, parts[1]) ?? null;
            }
        }
        return null;
    }

    /**
     * Try progressively shorter dotted prefixes against the caller's
     * imports (function-scoped first), appending the remaining suffix.
     */
    private resolveByPrefix(call: string, caller: PythonMetadata): string | null {
        const moduleImports = this.table.getImports(caller.module);
        const parts = call.split('.');

        for (let i = parts.length; i > 0; i--) {
            const prefix = parts.slice(0, i).join('.');
            const target = ownValue(caller.functionLocalImports, prefix) ?? moduleImports.get(prefix);
            if (target === undefined) continue;

            const suffix = parts.slice(i).join('.');
            const candidate = suffix ? `${target}.${suffix}` : target;
            if (this.table.hasSymbol(candidate)) {
                return candidate;
            }
        }
        return null;
    }
}

/**
 * Resolve every symbol of a merged Python table.
 */
export function resolvePythonCalls(table: PythonSymbolTable): void {
    new PythonCallResolver(table).resolveAll();
}
