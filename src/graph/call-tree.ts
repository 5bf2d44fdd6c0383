/**
 * Call Tree Builder
 *
 * Two passes over the resolved symbol universe:
 *   1. Build one tree per entry point. A symbol already on the current path
 *      becomes a leaf, so recursion (direct or mutual) terminates. The
 *      deepest node whose symbol has changes is remembered.
 *   2. Expand every node shallower than max(defaultDepth, deepest change).
 *
 * A symbol reached from two entry points gets two distinct nodes.
 */

import { DEFAULT_CONFIG } from '../common/config';
import { createLogger } from '../common/logger';
import type { CodeSymbol, SymbolUniverse } from '../parser/types';
import type { CallTreeNode, CallTreeOptions } from './types';

const log = createLogger('call-tree');

export function buildCallTrees(
    entryPoints: CodeSymbol[],
    universe: SymbolUniverse,
    options: CallTreeOptions = {}
): CallTreeNode[] {
    const defaultDepth = options.defaultDepth ?? DEFAULT_CONFIG.defaultExpansionDepth;
    let maxChangedDepth = 0;

    // Qualified names on the path from the root to the node being built
    const onPath = new Set<string>();

    const build = (symbol: CodeSymbol, depth: number): CallTreeNode => {
        if (symbol.hasChanges && depth > maxChangedDepth) {
            maxChangedDepth = depth;
        }

        const node: CallTreeNode = { symbol, children: [], depth, isExpanded: false };
        if (onPath.has(symbol.qualifiedName)) {
            return node;
        }

        onPath.add(symbol.qualifiedName);
        for (const target of new Set(symbol.resolvedCalls)) {
            const callee = universe.get(target);
            if (callee) {
                node.children.push(build(callee, depth + 1));
            }
        }
        onPath.delete(symbol.qualifiedName);

        return node;
    };

    const trees = entryPoints.map(entry => build(entry, 0));

    const expansionDepth = Math.max(defaultDepth, maxChangedDepth);
    for (const tree of trees) {
        applyExpansion(tree, expansionDepth);
    }

    log.debug('Built call trees', { trees: trees.length, expansionDepth, maxChangedDepth });
    return trees;
}

function applyExpansion(node: CallTreeNode, expansionDepth: number): void {
    node.isExpanded = node.depth < expansionDepth;
    for (const child of node.children) {
        applyExpansion(child, expansionDepth);
    }
}

/**
 * Total number of nodes in a tree (or forest).
 */
export function countNodes(trees: CallTreeNode | CallTreeNode[]): number {
    const roots = Array.isArray(trees) ? trees : [trees];
    let count = 0;
    for (const root of roots) {
        count += 1 + countNodes(root.children);
    }
    return count;
}

/**
 * Every node whose symbol has the given qualified name, in pre-order.
 */
export function findNodes(trees: CallTreeNode | CallTreeNode[], qualifiedName: string): CallTreeNode[] {
    const roots = Array.isArray(trees) ? trees : [trees];
    const found: CallTreeNode[] = [];
    const visit = (node: CallTreeNode) => {
        if (node.symbol.qualifiedName === qualifiedName) found.push(node);
        node.children.forEach(visit);
    };
    roots.forEach(visit);
    return found;
}
