/**
 * Language Analyzer Pattern
 *
 * Standardized interface for plugging a language into the analysis pipeline.
 * Each language implements a LanguageAnalyzer; the orchestrator only ever
 * talks to this interface.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AnalysisWarning, WarningKind } from '../common/errors';
import { errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import type { SymbolTable } from './symbol-table';

const log = createLogger('analyzer');

/**
 * Language analyzer interface
 *
 * Lifecycle per run: buildSymbolTable for each file, mergeSymbolTables once,
 * resolveCalls once, then markEntryPoints.
 */
export interface LanguageAnalyzer {
    /**
     * Unique language identifier (lowercase)
     * Examples: 'python', 'shell'
     */
    readonly id: string;

    /**
     * Human-readable language name
     */
    readonly displayName: string;

    /**
     * File extensions owned by this language (lowercase, with dot)
     */
    readonly extensions: readonly string[];

    canAnalyze(filePath: string): boolean;

    /**
     * Build the table for a single file. Never rejects: a file that cannot
     * be read or parsed yields an empty table and a recorded warning.
     */
    buildSymbolTable(filePath: string): Promise<SymbolTable>;

    /**
     * Merge per-file tables into one. Later tables win on qualified-name
     * collisions.
     */
    mergeSymbolTables(tables: SymbolTable[]): SymbolTable;

    /**
     * Populate resolvedCalls from rawCalls. Running it twice gives the same
     * result as running it once.
     */
    resolveCalls(table: SymbolTable): void;

    markEntryPoints?(table: SymbolTable): void;

    getLanguageName(): string;

    /**
     * Return and clear the warnings recorded since the last call.
     */
    takeWarnings(): AnalysisWarning[];
}

/**
 * Base analyzer
 *
 * Provides extension matching, project-relative paths and warning
 * bookkeeping. Subclasses supply the language-specific passes.
 */
export abstract class BaseAnalyzer implements LanguageAnalyzer {
    abstract readonly id: string;
    abstract readonly displayName: string;
    abstract readonly extensions: readonly string[];

    readonly projectRoot: string;
    private warnings: AnalysisWarning[] = [];

    constructor(projectRoot: string) {
        this.projectRoot = path.resolve(projectRoot);
    }

    abstract buildSymbolTable(filePath: string): Promise<SymbolTable>;
    abstract mergeSymbolTables(tables: SymbolTable[]): SymbolTable;
    abstract resolveCalls(table: SymbolTable): void;

    canAnalyze(filePath: string): boolean {
        return this.extensions.includes(path.extname(filePath).toLowerCase());
    }

    getLanguageName(): string {
        return this.id;
    }

    takeWarnings(): AnalysisWarning[] {
        const taken = this.warnings;
        this.warnings = [];
        return taken;
    }

    /**
     * Project-relative path with forward slashes.
     */
    protected relativePath(filePath: string): string {
        return path.relative(this.projectRoot, path.resolve(this.projectRoot, filePath)).split(path.sep).join('/');
    }

    /**
     * Dotted name for a project-relative path: extension dropped,
     * separators turned into dots (`scripts/run.sh` -> `scripts.run`).
     */
    protected dottedName(relativePath: string): string {
        const ext = path.posix.extname(relativePath);
        const stem = ext ? relativePath.slice(0, -ext.length) : relativePath;
        return stem.split('/').filter(Boolean).join('.');
    }

    protected recordWarning(kind: WarningKind, source: string, error: unknown): void {
        const warning: AnalysisWarning = { kind, source, message: errorMessage(error) };
        log.warn(`Skipping ${source}`, { language: this.id, kind, reason: warning.message });
        this.warnings.push(warning);
    }

    /**
     * Read a source file, recording a read warning on failure.
     */
    protected async readSource(filePath: string): Promise<string | null> {
        try {
            return await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            this.recordWarning('read', this.relativePath(filePath), error);
            return null;
        }
    }
}
