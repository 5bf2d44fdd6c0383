/**
 * Analysis Orchestrator
 *
 * Runs the analysis pipeline for one project root:
 *   1. discover files (excluded and hidden directories skipped, sorted)
 *   2. group them by analyzer
 *   3. build one table per file and merge per language
 *   4. resolve calls within each language
 *   5. mark entry points, then let an optional filter narrow them
 *   6. run the cross-language bridges
 *
 * Every run produces its own tables; nothing is shared between runs.
 */

import * as fs from 'fs';
import * as path from 'path';
import pLimit from 'p-limit';
import { HttpToPythonBridge } from '../bridges/http-to-python';
import { CrossLanguageResolver } from '../bridges/cross-language-resolver';
import { ShellToPythonScriptBridge } from '../bridges/script-to-python';
import type { LanguageBridge } from '../bridges/types';
import type { CallscopeConfig } from '../common/config';
import { excludedDirsFor, loadConfig } from '../common/config';
import type { AnalysisWarning } from '../common/errors';
import { errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import type { LanguageAnalyzer } from '../parser/adapter';
import { PythonAnalyzer } from '../parser/python/adapter';
import { AnalyzerRegistry } from '../parser/registry';
import { ShellAnalyzer } from '../parser/shell/adapter';
import type { SymbolTable, SymbolTables } from '../parser/symbol-table';
import type { CodeSymbol, SymbolUniverse } from '../parser/types';
import { applyEntryPointFilter } from './entry-point-filter';
import type { EntryPointFilter } from './types';

const log = createLogger('orchestrator');

export interface OrchestratorOptions {
    /** Validated configuration (default: loadConfig(projectRoot)) */
    config?: CallscopeConfig;
    entryPointFilter?: EntryPointFilter;
    /**
     * Replaces the built-in Python and shell analyzers. Called with the
     * resolved root, since analyzers compute names against it.
     */
    analyzers?: (projectRoot: string) => LanguageAnalyzer[];
    /** Replaces the built-in bridges */
    bridges?: LanguageBridge[];
}

export class AnalysisOrchestrator {
    readonly projectRoot: string;
    readonly registry: AnalyzerRegistry;

    private readonly config: CallscopeConfig;
    private readonly crossLanguage: CrossLanguageResolver;
    private readonly entryPointFilter?: EntryPointFilter;
    private warnings: AnalysisWarning[] = [];

    constructor(projectRoot: string, options: OrchestratorOptions = {}) {
        this.projectRoot = path.resolve(projectRoot);
        this.config = options.config ?? loadConfig(this.projectRoot);
        this.entryPointFilter = options.entryPointFilter;

        this.registry = new AnalyzerRegistry(options.analyzers?.(this.projectRoot) ?? [
            new PythonAnalyzer(this.projectRoot),
            new ShellAnalyzer(this.projectRoot),
        ]);
        this.crossLanguage = new CrossLanguageResolver(options.bridges ?? [
            new HttpToPythonBridge(),
            new ShellToPythonScriptBridge(),
        ]);
    }

    /**
     * Run the full pipeline.
     *
     * @returns language -> merged, resolved table
     */
    async analyze(): Promise<SymbolTables> {
        this.warnings = [];

        return log.time('Analysis complete', async () => {
            const files = await this.discoverFiles();
            const groups = this.groupByAnalyzer(files);

            const tables: SymbolTables = new Map();
            for (const [analyzer, analyzerFiles] of groups) {
                const merged = await this.buildLanguageTable(analyzer, analyzerFiles);
                tables.set(analyzer.getLanguageName(), merged);
                log.info(`Built ${analyzer.displayName} table`, { files: analyzerFiles.length, symbols: merged.size });
            }

            for (const [analyzer] of groups) {
                const table = tables.get(analyzer.getLanguageName());
                if (table) analyzer.resolveCalls(table);
            }

            for (const [analyzer] of groups) {
                const table = tables.get(analyzer.getLanguageName());
                if (table && analyzer.markEntryPoints) analyzer.markEntryPoints(table);
            }

            if (this.entryPointFilter) {
                await applyEntryPointFilter(tables, this.entryPointFilter);
            }

            this.crossLanguage.run(tables);
            this.collectWarnings(groups.keys());

            return tables;
        }, { projectRoot: this.projectRoot });
    }

    /**
     * Recoverable problems from the last run (unreadable or unparsable
     * files, failing bridges).
     */
    getWarnings(): AnalysisWarning[] {
        return [...this.warnings];
    }

    // ========================================================================
    // Pipeline Stages
    // ========================================================================

    /**
     * Absolute paths of every supported file, sorted by relative path.
     */
    async discoverFiles(): Promise<string[]> {
        const excluded = excludedDirsFor(this.config);
        const found: string[] = [];

        const walk = async (dir: string): Promise<void> => {
            let entries: fs.Dirent[];
            try {
                entries = await fs.promises.readdir(dir, { withFileTypes: true });
            } catch (error) {
                const source = path.relative(this.projectRoot, dir) || '.';
                log.warn(`Skipping unreadable directory ${source}`, { reason: errorMessage(error) });
                this.warnings.push({ kind: 'read', source, message: errorMessage(error) });
                return;
            }

            for (const entry of entries) {
                const fullPath = path.join(dir, entry.name);
                if (entry.isDirectory()) {
                    if (entry.name.startsWith('.') || excluded.has(entry.name)) continue;
                    await walk(fullPath);
                } else if (entry.isFile() && this.registry.isSupported(entry.name)) {
                    found.push(fullPath);
                }
            }
        };

        await walk(this.projectRoot);

        const relative = (file: string) => path.relative(this.projectRoot, file).split(path.sep).join('/');
        found.sort((a, b) => {
            const ra = relative(a);
            const rb = relative(b);
            return ra < rb ? -1 : ra > rb ? 1 : 0;
        });

        log.debug('Discovered files', { count: found.length });
        return found;
    }

    private groupByAnalyzer(files: string[]): Map<LanguageAnalyzer, string[]> {
        const groups = new Map<LanguageAnalyzer, string[]>();
        for (const file of files) {
            const analyzer = this.registry.getAnalyzer(file);
            if (!analyzer) continue;
            const group = groups.get(analyzer);
            if (group) {
                group.push(file);
            } else {
                groups.set(analyzer, [file]);
            }
        }
        return groups;
    }

    /**
     * Per-file tables built with bounded concurrency, merged in input order.
     */
    private async buildLanguageTable(analyzer: LanguageAnalyzer, files: string[]): Promise<SymbolTable> {
        const limit = pLimit(this.config.maxConcurrency);
        const perFile = await Promise.all(files.map(file => limit(() => analyzer.buildSymbolTable(file))));
        return analyzer.mergeSymbolTables(perFile);
    }

    private collectWarnings(analyzers: Iterable<LanguageAnalyzer>): void {
        for (const analyzer of analyzers) {
            this.warnings.push(...analyzer.takeWarnings());
        }
        this.warnings.push(...this.crossLanguage.takeWarnings());
        if (this.warnings.length > 0) {
            log.warn('Analysis finished with warnings', { warnings: this.warnings.length });
        }
    }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Entry points across all languages: every shell script, plus the symbols
 * of other languages marked as entry points.
 */
export function getEntryPoints(tables: SymbolTables): CodeSymbol[] {
    const entryPoints: CodeSymbol[] = [];
    for (const [language, table] of tables) {
        for (const symbol of table.getAllSymbols()) {
            if (language === 'shell' || symbol.isEntryPoint) {
                entryPoints.push(symbol);
            }
        }
    }
    return entryPoints;
}

/**
 * qualified name -> symbol, across all tables
 */
export function flattenSymbolTables(tables: SymbolTables): SymbolUniverse {
    const universe: SymbolUniverse = new Map();
    for (const table of tables.values()) {
        for (const [qualifiedName, symbol] of table.symbols) {
            universe.set(qualifiedName, symbol);
        }
    }
    return universe;
}
