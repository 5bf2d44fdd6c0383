/**
 * Graph Types
 *
 * Call trees are a projection of the flat symbol universe rooted at entry
 * points. They are rebuilt for every analysis and never shared.
 */

import type { CodeSymbol } from '../parser/types';

// ============================================================================
// Call Trees
// ============================================================================

export interface CallTreeNode {
    symbol: CodeSymbol;
    children: CallTreeNode[];
    /** Distance from the root (root = 0) */
    depth: number;
    /** Set by the expansion pass once the whole tree exists */
    isExpanded: boolean;
}

export interface CallTreeOptions {
    /** Minimum depth expanded in every tree */
    defaultDepth?: number;
}

// ============================================================================
// Entry-Point Filtering
// ============================================================================

/**
 * What an entry-point filter gets to see about one heuristic candidate.
 */
export interface EntryPointCandidate {
    qualifiedName: string;
    name: string;
    language: string;
    filePath: string;
    documentation: string | null;
    usesCliParsing: boolean;
    calledInMainGuard: boolean;
    isTest: boolean;
    isPrivate: boolean;
    /** Symbols whose resolvedCalls name this one */
    callerCount: number;
    /** Distinct resolved targets */
    calleeCount: number;
}

/**
 * External collaborator that narrows the heuristic entry points, e.g. a
 * model-backed reviewer. Returning a candidate keeps it.
 */
export interface EntryPointFilter {
    filter(candidates: EntryPointCandidate[]): Promise<EntryPointCandidate[]>;
}
