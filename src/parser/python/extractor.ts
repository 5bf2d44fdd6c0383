/**
 * Python Extractor
 *
 * Tree-sitter based extraction of callable symbols from one Python file:
 *   - Top-level functions and class methods (async and decorated included)
 *   - Raw calls, local constructor bindings and function-scoped imports
 *   - HTTP route decorators (FastAPI / Flask style)
 *   - Top-level import bindings and class structure for call resolution
 *   - `__main__` guard calls, CLI parsing hints and server scripts
 */

import * as path from 'path';
import Parser from 'tree-sitter';
import type { SyntaxNode } from 'tree-sitter';
import {
    CLI_CALL_FRAGMENTS,
    CLI_DECORATOR_NAMES,
    HTTP_DECORATOR_METHODS,
    NON_SCRIPT_PATH_PATTERNS,
    PARSE_CHUNK_SIZE,
    SCRIPT_SYMBOL_PREFIX,
    SERVER_START_PATTERNS,
} from '../config';
import { createSymbol, pythonMetadata, toHttpMethod } from '../types';
import type { CodeSymbol, HttpMethod, HttpRoute, PythonMetadata } from '../types';
import { IMPORT_NODE_TYPES, PythonImportParser } from './imports';
import type { ModuleContext } from './imports';
import type { ClassInfo } from './symbol-table';

// Tree-sitter Python grammar - require at runtime
// eslint-disable-next-line @typescript-eslint/no-require-imports
const Python: Parameters<Parser['setLanguage']>[0] = require('tree-sitter-python');

export interface PythonFileExtraction {
    module: string;
    /** Functions, methods and the synthetic script symbol, in source order */
    symbols: CodeSymbol[];
    classes: ClassInfo[];
    /** Top-level import bindings: local name -> qualified target */
    imports: Map<string, string>;
}

export class PythonSyntaxError extends Error {
    constructor(readonly filePath: string, readonly line: number) {
        super(`Syntax error in ${filePath} at line ${line}`);
        this.name = 'PythonSyntaxError';
    }
}

/** Statements whose bodies still belong to module scope */
const MODULE_SCOPE_CONTAINERS: ReadonlySet<string> = new Set([
    'if_statement',
    'elif_clause',
    'else_clause',
    'try_statement',
    'except_clause',
    'except_group_clause',
    'finally_clause',
    'with_statement',
    'for_statement',
    'while_statement',
    'block',
]);

const MAIN_GUARD_CONDITIONS: ReadonlySet<string> = new Set([
    '__name__=="__main__"',
    "__name__=='__main__'",
    '"__main__"==__name__',
    "'__main__'==__name__",
]);

/**
 * Dotted module name for a project-relative `.py` path.
 * `pkg/__init__.py` names the package itself.
 */
export function moduleNameFor(relativePath: string): ModuleContext {
    const segments = relativePath.replace(/\.py$/i, '').split('/').filter(Boolean);
    const isPackage = segments.length > 1 && segments[segments.length - 1] === '__init__';
    if (isPackage) {
        segments.pop();
    }
    return { module: segments.join('.'), isPackage };
}

/**
 * Clean a docstring the way Python's `inspect.cleandoc` does: tabs
 * expanded, common indentation of continuation lines removed, leading
 * and trailing blank lines dropped.
 */
export function cleanDocstring(doc: string): string {
    const lines = doc.split('\n').map(expandTabs);

    let margin = Number.POSITIVE_INFINITY;
    for (const line of lines.slice(1)) {
        const content = line.trimStart().length;
        if (content > 0) {
            margin = Math.min(margin, line.length - content);
        }
    }

    if (lines.length > 0) {
        lines[0] = lines[0].trimStart();
    }
    if (Number.isFinite(margin)) {
        for (let i = 1; i < lines.length; i++) {
            lines[i] = lines[i].slice(margin);
        }
    }
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    while (lines.length > 0 && lines[0] === '') lines.shift();
    return lines.join('\n');
}

function expandTabs(line: string, tabSize = 8): string {
    let out = '';
    for (const ch of line) {
        if (ch === '\t') {
            out += ' '.repeat(tabSize - (out.length % tabSize));
        } else {
            out += ch;
        }
    }
    return out;
}

/**
 * Value of a plain string literal node, or null for f-strings, byte
 * strings and anything that is not a single literal.
 */
export function stringLiteralValue(node: SyntaxNode): string | null {
    if (node.type !== 'string') return null;
    const match = /^([rRuU]*)("""|'''|"|')([\s\S]*)\2$/.exec(node.text);
    return match ? match[3] : null;
}

/**
 * Callee name of a call's function expression:
 * - foo() -> "foo"
 * - obj.method() -> "obj.method"
 * - a.b.c() -> "a.b.c"
 * - make().run() -> "run"
 */
export function calleeName(node: SyntaxNode): string | null {
    if (node.type === 'identifier') {
        return node.text;
    }
    if (node.type === 'attribute') {
        const attribute = node.childForFieldName('attribute');
        if (!attribute) return null;
        const object = node.childForFieldName('object');
        const receiver = object ? calleeName(object) : null;
        return receiver ? `${receiver}.${attribute.text}` : attribute.text;
    }
    return null;
}

function walk(node: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
    // Returning false from visit skips the node's children
    if (visit(node) === false) return;
    for (const child of node.namedChildren) {
        walk(child, visit);
    }
}

/**
 * The function_definition or class_definition inside a decorated_definition.
 */
function unwrapDefinition(node: SyntaxNode): { definition: SyntaxNode; decorators: SyntaxNode[] } | null {
    if (node.type === 'function_definition' || node.type === 'class_definition') {
        return { definition: node, decorators: [] };
    }
    if (node.type === 'decorated_definition') {
        const definition = node.childForFieldName('definition');
        if (!definition) return null;
        return { definition, decorators: node.namedChildren.filter(c => c.type === 'decorator') };
    }
    return null;
}

interface FileContext extends ModuleContext {
    relativePath: string;
    importParser: PythonImportParser;
}

export class PythonExtractor {
    private parser: Parser;

    constructor() {
        this.parser = new Parser();
        this.parser.setLanguage(Python);
    }

    /**
     * Extract symbols from source text.
     *
     * @param relativePath Project-relative path with forward slashes
     * @throws PythonSyntaxError when the tree contains syntax errors
     */
    public extract(source: string, relativePath: string): PythonFileExtraction {
        const tree = this.parse(source);
        const root = tree.rootNode;

        const errors = root.descendantsOfType('ERROR');
        if (errors.length > 0) {
            throw new PythonSyntaxError(relativePath, errors[0].startPosition.row + 1);
        }

        const moduleContext = moduleNameFor(relativePath);
        const context: FileContext = {
            ...moduleContext,
            relativePath,
            importParser: new PythonImportParser(moduleContext),
        };

        const symbols: CodeSymbol[] = [];
        const classes: ClassInfo[] = [];
        const importNodes: SyntaxNode[] = [];
        const mainGuards: SyntaxNode[] = [];

        const visitModuleScope = (node: SyntaxNode) => {
            for (const child of node.namedChildren) {
                if (IMPORT_NODE_TYPES.has(child.type)) {
                    importNodes.push(child);
                    continue;
                }

                const unwrapped = unwrapDefinition(child);
                if (unwrapped) {
                    const { definition, decorators } = unwrapped;
                    if (definition.type === 'function_definition') {
                        const symbol = this.extractFunction(definition, decorators, context, null);
                        if (symbol) symbols.push(symbol);
                    } else {
                        const extracted = this.extractClass(definition, context);
                        if (extracted) {
                            classes.push(extracted.info);
                            symbols.push(...extracted.methods);
                        }
                    }
                    continue;
                }

                if (child.type === 'if_statement' && this.isMainGuard(child)) {
                    mainGuards.push(child);
                }
                if (MODULE_SCOPE_CONTAINERS.has(child.type)) {
                    visitModuleScope(child);
                }
            }
        };
        visitModuleScope(root);

        this.markMainGuardCalls(symbols, mainGuards);

        const script = this.detectScript(source, context, mainGuards.length > 0);
        if (script) {
            // Defined functions keep precedence over the synthetic symbol
            symbols.unshift(script);
        }

        return {
            module: context.module,
            symbols,
            classes,
            imports: context.importParser.collect(importNodes),
        };
    }

    /**
     * Files over tree-sitter's string size limit are parsed in chunks
     * through the input callback.
     */
    private parse(source: string): Parser.Tree {
        return this.parser.parse((index: number) => source.slice(index, index + PARSE_CHUNK_SIZE));
    }

    // ========================================================================
    // Functions
    // ========================================================================

    private extractFunction(
        node: SyntaxNode,
        decorators: SyntaxNode[],
        context: FileContext,
        className: string | null
    ): CodeSymbol | null {
        const nameNode = node.childForFieldName('name');
        if (!nameNode) return null;
        const name = nameNode.text;

        const body = node.childForFieldName('body');
        const returnType = node.childForFieldName('return_type');
        const rawCalls = body ? this.extractCalls(body) : [];
        const decoratorTexts = decorators.map(d => d.text.replace(/^@\s*/, ''));

        const metadata: PythonMetadata = pythonMetadata(context.module, {
            parameters: this.extractParameters(node.childForFieldName('parameters')),
            returnType: returnType ? returnType.text : null,
            isClassMethod: className !== null,
            className,
            isAsync: node.children.some(c => c.type === 'async'),
            decorators: decoratorTexts,
            localBindings: body ? this.extractLocalBindings(body) : {},
            functionLocalImports: body ? this.extractFunctionLocalImports(body, context) : {},
            http: this.extractHttpRoute(decorators),
            usesCliParsing: this.usesCliParsing(rawCalls, body, decorators),
        });

        const qualifiedName = className
            ? `${context.module}.${className}.${name}`
            : `${context.module}.${name}`;

        return createSymbol({
            name,
            qualifiedName,
            language: 'python',
            filePath: context.relativePath,
            lineNumber: node.startPosition.row + 1,
            metadata,
            rawCalls,
            documentation: body ? this.extractDocstring(body) : null,
        });
    }

    /**
     * Positional parameter names, stopping at `*`, `*args` and `**kwargs`.
     */
    private extractParameters(node: SyntaxNode | null): string[] {
        const parameters: string[] = [];
        if (!node) return parameters;

        for (const param of node.namedChildren) {
            let nameNode: SyntaxNode | null = null;
            switch (param.type) {
                case 'identifier':
                    nameNode = param;
                    break;
                case 'typed_parameter':
                    nameNode = param.namedChildren[0] ?? null;
                    break;
                case 'default_parameter':
                case 'typed_default_parameter':
                    nameNode = param.childForFieldName('name');
                    break;
                case 'positional_separator':
                    continue;
                default:
                    // list_splat_pattern, dictionary_splat_pattern, keyword_separator
                    return parameters;
            }
            if (!nameNode || nameNode.type !== 'identifier') {
                return parameters;
            }
            parameters.push(nameNode.text);
        }
        return parameters;
    }

    /**
     * Every call in the body, nested definitions included, in source order.
     */
    private extractCalls(body: SyntaxNode): string[] {
        const calls: string[] = [];
        walk(body, (node) => {
            if (node.type !== 'call') return;
            const fn = node.childForFieldName('function');
            const name = fn ? calleeName(fn) : null;
            if (name) calls.push(name);
        });
        return calls;
    }

    /**
     * `var = Ctor(...)` assignments: var -> callee text.
     */
    private extractLocalBindings(body: SyntaxNode): Record<string, string> {
        const bindings: Record<string, string> = {};
        walk(body, (node) => {
            if (node.type !== 'assignment') return;
            const left = node.childForFieldName('left');
            const right = node.childForFieldName('right');
            if (!left || left.type !== 'identifier' || !right || right.type !== 'call') return;
            const fn = right.childForFieldName('function');
            const ctor = fn ? calleeName(fn) : null;
            if (ctor) bindings[left.text] = ctor;
        });
        return bindings;
    }

    /**
     * Imports written inside the body (try/except and if blocks included),
     * not descending into nested definitions.
     */
    private extractFunctionLocalImports(body: SyntaxNode, context: FileContext): Record<string, string> {
        const importNodes: SyntaxNode[] = [];
        walk(body, (node) => {
            if (node.type === 'function_definition' || node.type === 'class_definition') return false;
            if (IMPORT_NODE_TYPES.has(node.type)) {
                importNodes.push(node);
                return false;
            }
        });
        return Object.fromEntries(context.importParser.collect(importNodes));
    }

    private extractDocstring(body: SyntaxNode): string | null {
        const first = body.namedChildren[0];
        if (!first || first.type !== 'expression_statement') return null;
        const expression = first.namedChildren[0];
        if (!expression || first.namedChildren.length !== 1) return null;
        const value = stringLiteralValue(expression);
        return value === null ? null : cleanDocstring(value);
    }

    // ========================================================================
    // Decorators
    // ========================================================================

    /**
     * Route of the first HTTP decorator:
     * - @app.post("/analyze") -> POST /analyze
     * - @router.get(path="/health") -> GET /health
     * - @app.route("/analyze", methods=["POST"]) -> POST /analyze
     */
    private extractHttpRoute(decorators: SyntaxNode[]): HttpRoute | null {
        for (const decorator of decorators) {
            const expression = decorator.namedChildren[0];
            if (!expression || expression.type !== 'call') continue;

            const fn = expression.childForFieldName('function');
            if (!fn || fn.type !== 'attribute') continue;
            const attribute = fn.childForFieldName('attribute')?.text ?? '';

            const args = expression.childForFieldName('arguments');
            if (!args) continue;

            if (HTTP_DECORATOR_METHODS.has(attribute)) {
                const route = this.routeArgument(args);
                const method = toHttpMethod(attribute);
                if (route !== null && method) {
                    return { method, route };
                }
            } else if (attribute === 'route') {
                const route = this.routeArgument(args);
                if (route !== null) {
                    return { method: this.firstFlaskMethod(args) ?? 'GET', route };
                }
            }
        }
        return null;
    }

    /** First positional string argument, else the `path=` keyword */
    private routeArgument(args: SyntaxNode): string | null {
        const first = args.namedChildren[0];
        if (first && first.type !== 'keyword_argument') {
            const value = stringLiteralValue(first);
            if (value !== null) return value;
        }
        const keyword = this.keywordArgument(args, 'path');
        return keyword ? stringLiteralValue(keyword) : null;
    }

    private firstFlaskMethod(args: SyntaxNode): HttpMethod | null {
        const methods = this.keywordArgument(args, 'methods');
        if (!methods || methods.type !== 'list') return null;
        const first = methods.namedChildren[0];
        const value = first ? stringLiteralValue(first) : null;
        return value === null ? null : toHttpMethod(value);
    }

    private keywordArgument(args: SyntaxNode, name: string): SyntaxNode | null {
        for (const arg of args.namedChildren) {
            if (arg.type !== 'keyword_argument') continue;
            if (arg.childForFieldName('name')?.text === name) {
                return arg.childForFieldName('value');
            }
        }
        return null;
    }

    private usesCliParsing(rawCalls: string[], body: SyntaxNode | null, decorators: SyntaxNode[]): boolean {
        if (rawCalls.some(call => CLI_CALL_FRAGMENTS.some(fragment => call.includes(fragment)))) {
            return true;
        }

        for (const decorator of decorators) {
            const expression = decorator.namedChildren[0];
            if (!expression) continue;
            const target = expression.type === 'call' ? expression.childForFieldName('function') : expression;
            const name = target ? calleeName(target) : null;
            if (name && CLI_DECORATOR_NAMES.has(name.split('.').pop() ?? '')) {
                return true;
            }
        }

        if (!body) return false;
        return body.descendantsOfType('attribute').some(node => node.text === 'sys.argv');
    }

    // ========================================================================
    // Classes
    // ========================================================================

    private extractClass(node: SyntaxNode, context: FileContext): { info: ClassInfo; methods: CodeSymbol[] } | null {
        const nameNode = node.childForFieldName('name');
        if (!nameNode) return null;
        const name = nameNode.text;

        const baseClasses: string[] = [];
        const superclasses = node.childForFieldName('superclasses');
        for (const base of superclasses?.namedChildren ?? []) {
            if (base.type === 'identifier' || base.type === 'attribute') {
                baseClasses.push(base.text);
            }
        }

        const info: ClassInfo = {
            name,
            qualifiedName: `${context.module}.${name}`,
            module: context.module,
            methods: new Map(),
            baseClasses,
            instanceAttributes: new Map(),
        };

        const methods: CodeSymbol[] = [];
        const body = node.childForFieldName('body');
        for (const child of body?.namedChildren ?? []) {
            const unwrapped = unwrapDefinition(child);
            if (!unwrapped || unwrapped.definition.type !== 'function_definition') continue;

            const method = this.extractFunction(unwrapped.definition, unwrapped.decorators, context, name);
            if (!method) continue;
            methods.push(method);
            info.methods.set(method.name, method.qualifiedName);

            if (method.name === '__init__') {
                const initBody = unwrapped.definition.childForFieldName('body');
                if (initBody) this.collectInstanceAttributes(initBody, info.instanceAttributes);
            }
        }

        return { info, methods };
    }

    /**
     * `self.attr = Ctor(...)` -> attr: "Ctor"
     */
    private collectInstanceAttributes(body: SyntaxNode, attributes: Map<string, string>): void {
        walk(body, (node) => {
            if (node.type !== 'assignment') return;
            const left = node.childForFieldName('left');
            const right = node.childForFieldName('right');
            if (!left || left.type !== 'attribute' || !right || right.type !== 'call') return;

            const object = left.childForFieldName('object');
            const attribute = left.childForFieldName('attribute');
            if (!object || object.type !== 'identifier' || object.text !== 'self' || !attribute) return;

            const fn = right.childForFieldName('function');
            const ctor = fn ? calleeName(fn) : null;
            if (ctor) attributes.set(attribute.text, ctor);
        });
    }

    // ========================================================================
    // Module Level
    // ========================================================================

    private isMainGuard(node: SyntaxNode): boolean {
        const condition = node.childForFieldName('condition');
        return condition !== null
            && condition.type === 'comparison_operator'
            && MAIN_GUARD_CONDITIONS.has(condition.text.replace(/\s+/g, ''));
    }

    /**
     * Top-level functions called by bare name inside a `__main__` guard.
     */
    private markMainGuardCalls(symbols: CodeSymbol[], guards: SyntaxNode[]): void {
        const called = new Set<string>();
        for (const guard of guards) {
            const consequence = guard.childForFieldName('consequence');
            if (!consequence) continue;
            for (const call of consequence.descendantsOfType('call')) {
                const fn = call.childForFieldName('function');
                if (fn && fn.type === 'identifier') called.add(fn.text);
            }
        }

        for (const symbol of symbols) {
            if (symbol.metadata.kind === 'python' && symbol.metadata.className === null && called.has(symbol.name)) {
                symbol.metadata.calledInMainGuard = true;
            }
        }
    }

    /**
     * A server started from a `__main__` guard becomes a file-level entry
     * point, unless the file is test or example code.
     */
    private detectScript(source: string, context: FileContext, hasMainGuard: boolean): CodeSymbol | null {
        if (!hasMainGuard) return null;
        if (!SERVER_START_PATTERNS.some(pattern => source.includes(pattern))) return null;

        const normalized = `/${context.relativePath.toLowerCase()}`;
        if (NON_SCRIPT_PATH_PATTERNS.some(pattern => normalized.includes(pattern))) return null;

        const stem = path.posix.basename(context.relativePath).replace(/\.py$/i, '');
        return createSymbol({
            name: `${SCRIPT_SYMBOL_PREFIX}${stem}>`,
            qualifiedName: context.module ? `${context.module}.${stem}` : stem,
            language: 'python',
            filePath: context.relativePath,
            lineNumber: 1,
            metadata: pythonMetadata(context.module, { isScript: true }),
        });
    }
}
