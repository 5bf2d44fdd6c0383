/**
 * Symbol Model
 *
 * A CodeSymbol is one callable unit in any supported language: a Python
 * function or method, a synthetic script entry point, a shell script.
 * Identity is the qualified name; two symbols with the same qualified name
 * are the same entity no matter which table produced them.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'];

export function toHttpMethod(value: string): HttpMethod | null {
    const upper = value.toUpperCase();
    return HTTP_METHODS.find(m => m === upper) ?? null;
}

export interface HttpRoute {
    method: HttpMethod;
    route: string;
}

// ============================================================================
// Language Metadata
// ============================================================================

export interface PythonMetadata {
    kind: 'python';
    /** Dotted module the symbol lives in */
    module: string;
    parameters: string[];
    returnType: string | null;
    isClassMethod: boolean;
    className: string | null;
    isAsync: boolean;
    decorators: string[];
    /** var -> constructor text, from `var = Ctor(...)` */
    localBindings: Record<string, string>;
    /** local name -> qualified import, for imports written inside the body */
    functionLocalImports: Record<string, string>;
    http: HttpRoute | null;
    usesCliParsing: boolean;
    calledInMainGuard: boolean;
    /** Synthetic file-level entry point (`<script:name>`) */
    isScript: boolean;
}

export type ShellCommandInfo =
    | { type: 'http'; client: string; method: HttpMethod; path: string }
    | { type: 'python'; form: 'script' | 'module'; target: string };

/** A command together with the line it starts on */
export type ShellCommand = ShellCommandInfo & { line: number };

export interface ShellMetadata {
    kind: 'shell';
    /** Position-free view of the commands, one entry per raw call */
    commands: ShellCommandInfo[];
}

export type SymbolMetadata = PythonMetadata | ShellMetadata;

// ============================================================================
// Symbol
// ============================================================================

export interface CodeSymbol {
    /** Display name (e.g. "analyze", "analyze.sh") */
    name: string;
    /** Globally unique dotted identifier (e.g. "src.api.analyze") */
    qualifiedName: string;
    language: string;
    filePath: string;
    lineNumber: number;
    metadata: SymbolMetadata;
    /** Call expressions as written, in source order */
    rawCalls: string[];
    /** Qualified targets; filled by resolution, extended by bridges */
    resolvedCalls: string[];
    isEntryPoint: boolean;
    /** Set only by the diff engine */
    hasChanges: boolean;
    documentation: string | null;
}

export function isSameSymbol(a: CodeSymbol, b: CodeSymbol): boolean {
    return a.qualifiedName === b.qualifiedName;
}

/**
 * Default-filled Python metadata, overridden field by field.
 */
export function pythonMetadata(module: string, overrides: Partial<Omit<PythonMetadata, 'kind' | 'module'>> = {}): PythonMetadata {
    return {
        kind: 'python',
        module,
        parameters: [],
        returnType: null,
        isClassMethod: false,
        className: null,
        isAsync: false,
        decorators: [],
        localBindings: {},
        functionLocalImports: {},
        http: null,
        usesCliParsing: false,
        calledInMainGuard: false,
        isScript: false,
        ...overrides,
    };
}

export interface SymbolInit {
    name: string;
    qualifiedName: string;
    language: string;
    filePath: string;
    lineNumber: number;
    metadata: SymbolMetadata;
    rawCalls?: string[];
    isEntryPoint?: boolean;
    documentation?: string | null;
}

export function createSymbol(init: SymbolInit): CodeSymbol {
    return {
        name: init.name,
        qualifiedName: init.qualifiedName,
        language: init.language,
        filePath: init.filePath,
        lineNumber: init.lineNumber,
        metadata: init.metadata,
        rawCalls: init.rawCalls ?? [],
        resolvedCalls: [],
        isEntryPoint: init.isEntryPoint ?? false,
        hasChanges: false,
        documentation: init.documentation ?? null,
    };
}

/**
 * Flat qualified-name -> symbol view across languages.
 */
export type SymbolUniverse = Map<string, CodeSymbol>;
