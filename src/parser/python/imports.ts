/**
 * Python Import Parser
 *
 * Turns import statements into local-name bindings. Handles:
 *   - import X            (binds X, and the head of a dotted X)
 *   - import X as Y
 *   - from X import Y     (binds Y -> X.Y)
 *   - from X import Y as Z
 *   - from . import X, from ..pkg import X (resolved against the current package)
 *
 * Wildcard imports bind nothing.
 */

import type { SyntaxNode } from 'tree-sitter';

export interface ImportBinding {
    /** The name used in code (alias if present, otherwise the imported name) */
    localName: string;
    /** Absolute dotted target */
    target: string;
}

export interface ModuleContext {
    /** Dotted name of the module being parsed */
    module: string;
    /** True for `__init__.py`, whose package is the module itself */
    isPackage: boolean;
}

export const IMPORT_NODE_TYPES: ReadonlySet<string> = new Set(['import_statement', 'import_from_statement']);

export class PythonImportParser {
    constructor(private readonly context: ModuleContext) {}

    /**
     * Bindings of one import_statement or import_from_statement node.
     */
    public parseStatement(node: SyntaxNode): ImportBinding[] {
        if (node.type === 'import_statement') {
            return this.parseImportStatement(node);
        }
        if (node.type === 'import_from_statement') {
            return this.parseImportFromStatement(node);
        }
        return [];
    }

    /**
     * Collect bindings from several statements into a map (later wins).
     */
    public collect(nodes: Iterable<SyntaxNode>): Map<string, string> {
        const bindings = new Map<string, string>();
        for (const node of nodes) {
            for (const binding of this.parseStatement(node)) {
                bindings.set(binding.localName, binding.target);
            }
        }
        return bindings;
    }

    /**
     * Absolute module for a relative reference: `dots` leading dots followed
     * by an optional dotted name.
     */
    public resolveRelative(dots: number, name: string): string {
        const segments = this.context.module ? this.context.module.split('.') : [];
        if (!this.context.isPackage) {
            segments.pop();
        }
        const base = segments.slice(0, Math.max(0, segments.length - (dots - 1)));
        if (name) {
            base.push(name);
        }
        return base.join('.');
    }

    /**
     * Parse: import X, import X as Y, import X, Y, Z
     */
    private parseImportStatement(node: SyntaxNode): ImportBinding[] {
        const bindings: ImportBinding[] = [];

        for (const child of node.namedChildren) {
            if (child.type === 'dotted_name') {
                const moduleName = child.text;
                bindings.push({ localName: moduleName, target: moduleName });

                // "import os.path" also makes "os" usable
                const head = moduleName.split('.')[0];
                if (head !== moduleName) {
                    bindings.push({ localName: head, target: head });
                }
            } else if (child.type === 'aliased_import') {
                const nameNode = child.childForFieldName('name');
                const aliasNode = child.childForFieldName('alias');
                if (nameNode && aliasNode) {
                    bindings.push({ localName: aliasNode.text, target: nameNode.text });
                }
            }
        }

        return bindings;
    }

    /**
     * Parse: from X import Y, from X import Y as Z, from . import X
     */
    private parseImportFromStatement(node: SyntaxNode): ImportBinding[] {
        const moduleNode = node.childForFieldName('module_name');
        if (!moduleNode) return [];

        const base = moduleNode.type === 'relative_import'
            ? this.parseRelativeModule(moduleNode)
            : moduleNode.text;

        // Imported names follow the `import` keyword
        const importIndex = node.children.findIndex(c => c.type === 'import');
        if (importIndex < 0) return [];

        const bindings: ImportBinding[] = [];
        for (const child of node.children.slice(importIndex + 1)) {
            if (child.type === 'dotted_name') {
                bindings.push({ localName: child.text, target: qualify(base, child.text) });
            } else if (child.type === 'aliased_import') {
                const nameNode = child.childForFieldName('name');
                const aliasNode = child.childForFieldName('alias');
                if (nameNode) {
                    bindings.push({
                        localName: aliasNode ? aliasNode.text : nameNode.text,
                        target: qualify(base, nameNode.text),
                    });
                }
            }
        }

        return bindings;
    }

    private parseRelativeModule(node: SyntaxNode): string {
        let dots = 0;
        let name = '';
        for (const child of node.children) {
            if (child.type === 'import_prefix') {
                dots = child.text.length;
            } else if (child.type === 'dotted_name') {
                name = child.text;
            }
        }
        return this.resolveRelative(dots, name);
    }
}

function qualify(base: string, name: string): string {
    return base ? `${base}.${name}` : name;
}
