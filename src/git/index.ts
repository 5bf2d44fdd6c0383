/**
 * Git Module
 *
 * Structural diffs of the call graph between two refs.
 */

export { GitDiffAnalyzer } from './diff-analyzer';
export type { DiffResult, DiffOptions } from './diff-analyzer';

export { GitRefResolver, WORKING_TREE_DESCRIPTION } from './ref-resolver';
export { FileChangeDetector, parseNameStatusLine } from './file-changes';
export type { FileChange, FileChangeType } from './file-changes';
export { GitArchiveMaterializer } from './materializer';
export type { RefMaterializer, MaterializedTree, GitArchiveOptions } from './materializer';
export { diffSymbols, symbolsDiffer, sameCallSet, stampChanges, countChanges } from './symbol-diff';
export type { SymbolChange, SymbolChangeType, DiffSide } from './symbol-diff';
export { GitCli } from './version-control';
export type { VersionControl, RepositoryLayout, GitCliOptions } from './version-control';
