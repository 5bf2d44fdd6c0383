/**
 * callscope
 *
 * Cross-language call graphs for Python and shell projects, and structural
 * diffs of those graphs between git refs.
 *
 *     const tables = await analyze('/path/to/project');
 *     const trees = buildCallTrees(getEntryPoints(tables), flattenSymbolTables(tables));
 *
 *     const diff = await analyzeDiff('/path/to/project', 'HEAD~1', 'HEAD');
 */

import type { CallscopeConfig } from './common/config';
import { loadConfig } from './common/config';
import { setLogLevel } from './common/logger';
import type { OrchestratorOptions } from './graph/orchestrator';
import { AnalysisOrchestrator } from './graph/orchestrator';
import type { SymbolTables } from './parser/symbol-table';
import type { DiffOptions, DiffResult } from './git/diff-analyzer';
import { GitDiffAnalyzer } from './git/diff-analyzer';

/**
 * Configuration for a run, with its log level applied.
 */
function prepareConfig(projectRoot: string, config?: CallscopeConfig): CallscopeConfig {
    const resolved = config ?? loadConfig(projectRoot);
    setLogLevel(resolved.logLevel);
    return resolved;
}

/**
 * Full analysis of a project.
 *
 * @returns language -> resolved symbol table
 */
export async function analyze(projectRoot: string, options: OrchestratorOptions = {}): Promise<SymbolTables> {
    const config = prepareConfig(projectRoot, options.config);
    return new AnalysisOrchestrator(projectRoot, { ...options, config }).analyze();
}

/**
 * Structural diff between two refs. `afterRef` defaults to the working tree.
 *
 * @throws NotARepositoryError, InvalidRefError, CommandError
 */
export async function analyzeDiff(
    projectRoot: string,
    beforeRef = 'HEAD',
    afterRef?: string,
    options: DiffOptions = {}
): Promise<DiffResult> {
    const config = prepareConfig(projectRoot, options.config);
    const analyzer = new GitDiffAnalyzer(projectRoot, { ...options, config });
    return analyzer.analyzeDiff(beforeRef, afterRef ?? config.workingTreeRef);
}

export {
    AnalysisOrchestrator,
    getEntryPoints,
    flattenSymbolTables,
    buildCallTrees,
    countNodes,
    findNodes,
    buildCallerIndex,
    applyEntryPointFilter,
} from './graph';
export type {
    OrchestratorOptions,
    CallTreeNode,
    CallTreeOptions,
    EntryPointCandidate,
    EntryPointFilter,
} from './graph';

export {
    GitDiffAnalyzer,
    GitRefResolver,
    FileChangeDetector,
    GitArchiveMaterializer,
    GitCli,
    diffSymbols,
    symbolsDiffer,
    stampChanges,
} from './git';
export type {
    DiffResult,
    DiffOptions,
    FileChange,
    FileChangeType,
    SymbolChange,
    SymbolChangeType,
    VersionControl,
    RefMaterializer,
    MaterializedTree,
} from './git';

export { AnalyzerRegistry } from './parser/registry';
export { BaseAnalyzer } from './parser/adapter';
export type { LanguageAnalyzer } from './parser/adapter';
export { SymbolTable } from './parser/symbol-table';
export type { SymbolTables } from './parser/symbol-table';
export { PythonAnalyzer, PythonSymbolTable } from './parser/python';
export { ShellAnalyzer, ShellSymbolTable } from './parser/shell';
export { isSameSymbol, createSymbol } from './parser/types';
export type {
    CodeSymbol,
    SymbolMetadata,
    PythonMetadata,
    ShellMetadata,
    ShellCommandInfo,
    HttpRoute,
    HttpMethod,
    SymbolUniverse,
} from './parser/types';

export { CrossLanguageResolver, HttpToPythonBridge, ShellToPythonScriptBridge } from './bridges';
export type { LanguageBridge, CrossReferences } from './bridges';

export * from './common';
