/**
 * Python Symbol Table
 *
 * Adds the indexes the call resolver needs on top of the base table:
 * per-module import maps, classes by qualified and simple name, and
 * top-level functions per module.
 */

import { SymbolTable } from '../symbol-table';
import type { CodeSymbol } from '../types';

export interface ClassInfo {
    name: string;
    qualifiedName: string;
    module: string;
    /** method name -> method qualified name */
    methods: Map<string, string>;
    /** Base class expressions as written (`Base`, `models.Base`) */
    baseClasses: string[];
    /** attribute -> constructor text, from `self.attr = Ctor(...)` in `__init__` */
    instanceAttributes: Map<string, string>;
}

export class PythonSymbolTable extends SymbolTable {
    /** module -> (local name -> qualified target) */
    private readonly imports = new Map<string, Map<string, string>>();
    private readonly classes = new Map<string, ClassInfo>();
    private readonly classesByName = new Map<string, string[]>();
    /** module -> (function name -> qualified name) */
    private readonly functions = new Map<string, Map<string, string>>();

    constructor() {
        super('python');
    }

    override addSymbol(symbol: CodeSymbol): void {
        super.addSymbol(symbol);
        const metadata = symbol.metadata;
        if (metadata.kind === 'python' && metadata.className === null && !metadata.isScript) {
            let byName = this.functions.get(metadata.module);
            if (!byName) {
                byName = new Map();
                this.functions.set(metadata.module, byName);
            }
            byName.set(symbol.name, symbol.qualifiedName);
        }
    }

    // ========================================================================
    // Imports
    // ========================================================================

    /**
     * Replace the top-level import map of a module.
     */
    setImports(module: string, bindings: ReadonlyMap<string, string>): void {
        this.imports.set(module, new Map(bindings));
    }

    getImports(module: string): ReadonlyMap<string, string> {
        return this.imports.get(module) ?? new Map<string, string>();
    }

    // ========================================================================
    // Classes
    // ========================================================================

    addClass(info: ClassInfo): void {
        this.classes.set(info.qualifiedName, info);
        const sameName = this.classesByName.get(info.name) ?? [];
        if (!sameName.includes(info.qualifiedName)) {
            sameName.push(info.qualifiedName);
        }
        this.classesByName.set(info.name, sameName);
    }

    getClass(qualifiedName: string): ClassInfo | undefined {
        return this.classes.get(qualifiedName);
    }

    findClassesByName(name: string): ClassInfo[] {
        const found: ClassInfo[] = [];
        for (const qualifiedName of this.classesByName.get(name) ?? []) {
            const info = this.classes.get(qualifiedName);
            if (info) found.push(info);
        }
        return found;
    }

    /**
     * Resolve a class expression as written in `module` to a known class.
     *
     * Order: class defined in the module, imported name (with a dotted
     * suffix for `pkg.Cls` forms), already-qualified name, and finally a
     * simple name shared by exactly one class in the project.
     */
    resolveClass(typeName: string, module: string): ClassInfo | undefined {
        const local = this.classes.get(`${module}.${typeName}`);
        if (local) return local;

        const imports = this.getImports(module);
        const parts = typeName.split('.');
        for (let i = parts.length; i > 0; i--) {
            const target = imports.get(parts.slice(0, i).join('.'));
            if (target === undefined) continue;
            const suffix = parts.slice(i).join('.');
            const imported = this.classes.get(suffix ? `${target}.${suffix}` : target);
            if (imported) return imported;
        }

        const qualified = this.classes.get(typeName);
        if (qualified) return qualified;

        if (parts.length === 1) {
            const candidates = this.findClassesByName(typeName);
            if (candidates.length === 1) return candidates[0];
        }
        return undefined;
    }

    /**
     * Qualified name of `method` on a class, following base classes
     * depth-first in declaration order.
     */
    findMethod(info: ClassInfo, method: string, visited: Set<string> = new Set()): string | undefined {
        if (visited.has(info.qualifiedName)) return undefined;
        visited.add(info.qualifiedName);

        const own = info.methods.get(method);
        if (own) return own;

        for (const base of info.baseClasses) {
            const baseInfo = this.resolveClass(base, info.module);
            if (!baseInfo) continue;
            const inherited = this.findMethod(baseInfo, method, visited);
            if (inherited) return inherited;
        }
        return undefined;
    }

    /**
     * Constructor text of an instance attribute, searching base classes too.
     * The class that declares the attribute is returned with it, since the
     * text must be resolved against that class's module.
     */
    findInstanceAttribute(
        info: ClassInfo,
        attribute: string,
        visited: Set<string> = new Set()
    ): { owner: ClassInfo; constructorName: string } | undefined {
        if (visited.has(info.qualifiedName)) return undefined;
        visited.add(info.qualifiedName);

        const own = info.instanceAttributes.get(attribute);
        if (own) return { owner: info, constructorName: own };

        for (const base of info.baseClasses) {
            const baseInfo = this.resolveClass(base, info.module);
            if (!baseInfo) continue;
            const inherited = this.findInstanceAttribute(baseInfo, attribute, visited);
            if (inherited) return inherited;
        }
        return undefined;
    }

    // ========================================================================
    // Functions
    // ========================================================================

    /**
     * Qualified name of a top-level function of `module`. Methods and
     * synthetic script symbols are not indexed.
     */
    getFunction(module: string, name: string): string | undefined {
        return this.functions.get(module)?.get(name);
    }

    /**
     * Fold another table into this one; entries of `other` win.
     */
    absorb(other: PythonSymbolTable): void {
        for (const symbol of other.getAllSymbols()) {
            this.addSymbol(symbol);
        }
        for (const [module, bindings] of other.imports) {
            this.setImports(module, bindings);
        }
        for (const info of other.classes.values()) {
            this.addClass(info);
        }
    }
}
