/**
 * Graph Module
 *
 * Pipeline orchestration and call-tree construction.
 */

export {
    AnalysisOrchestrator,
    getEntryPoints,
    flattenSymbolTables,
} from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';

export { buildCallTrees, countNodes, findNodes } from './call-tree';

export {
    applyEntryPointFilter,
    buildCallerIndex,
    collectCandidates,
    toCandidate,
} from './entry-point-filter';

export type {
    CallTreeNode,
    CallTreeOptions,
    EntryPointCandidate,
    EntryPointFilter,
} from './types';
