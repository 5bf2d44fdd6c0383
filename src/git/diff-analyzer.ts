/**
 * Git Diff Analyzer
 *
 * Runs the whole pipeline at two refs and compares the resulting symbol
 * universes:
 *   1. resolve both refs (the working-tree token means "analyze in place")
 *   2. list changed files between the two states
 *   3. analyze each side, committed sides in an extracted copy
 *   4. diff the symbols
 *   5. stamp hasChanges on each side
 *   6. build each side's call trees
 *
 * A failing command or an unknown ref aborts the diff with a typed error.
 */

import * as path from 'path';
import type { CallscopeConfig } from '../common/config';
import { loadConfig } from '../common/config';
import { createLogger } from '../common/logger';
import { buildCallTrees } from '../graph/call-tree';
import type { OrchestratorOptions } from '../graph/orchestrator';
import { AnalysisOrchestrator, flattenSymbolTables, getEntryPoints } from '../graph/orchestrator';
import type { CallTreeNode } from '../graph/types';
import type { SymbolTables } from '../parser/symbol-table';
import type { SymbolUniverse } from '../parser/types';
import { FileChangeDetector } from './file-changes';
import type { FileChange } from './file-changes';
import { GitArchiveMaterializer } from './materializer';
import type { RefMaterializer } from './materializer';
import { GitRefResolver } from './ref-resolver';
import { countChanges, diffSymbols, stampChanges } from './symbol-diff';
import type { DiffSide, SymbolChange } from './symbol-diff';
import { GitCli } from './version-control';
import type { VersionControl } from './version-control';

const log = createLogger('diff');

export interface DiffResult {
    beforeRef: string;
    afterRef: string;
    /** null for the working tree */
    beforeCommit: string | null;
    afterCommit: string | null;
    beforeDescription: string;
    afterDescription: string;
    fileChanges: FileChange[];
    symbolChanges: Map<string, SymbolChange>;
    beforeTrees: CallTreeNode[];
    afterTrees: CallTreeNode[];
    added: number;
    modified: number;
    deleted: number;
}

export interface DiffOptions extends Omit<OrchestratorOptions, 'config'> {
    config?: CallscopeConfig;
    /** Default: git on the command line */
    vcs?: VersionControl;
    /** Default: git archive into a temporary directory */
    materializer?: RefMaterializer;
}

interface AnalyzedSide {
    tables: SymbolTables;
    universe: SymbolUniverse;
}

export class GitDiffAnalyzer {
    readonly projectRoot: string;

    private readonly config: CallscopeConfig;
    private readonly vcs: VersionControl;
    private readonly materializer: RefMaterializer;
    private readonly refs: GitRefResolver;

    constructor(projectRoot: string, private readonly options: DiffOptions = {}) {
        this.projectRoot = path.resolve(projectRoot);
        this.config = options.config ?? loadConfig(this.projectRoot);
        this.vcs = options.vcs ?? new GitCli(this.projectRoot, { timeoutMs: this.config.commandTimeoutMs });
        this.materializer = options.materializer
            ?? new GitArchiveMaterializer(this.vcs, { timeoutMs: this.config.archiveTimeoutMs });
        this.refs = new GitRefResolver(this.vcs, this.config.workingTreeRef);
    }

    async analyzeDiff(beforeRef = 'HEAD', afterRef: string = this.config.workingTreeRef): Promise<DiffResult> {
        return log.time('Diff complete', async () => {
            await this.vcs.verifyRepository();

            const beforeCommit = await this.refs.resolve(beforeRef);
            const afterCommit = await this.refs.resolve(afterRef);
            log.info('Resolved refs', { beforeRef, beforeCommit, afterRef, afterCommit });

            const extensions = this.createOrchestrator(this.projectRoot).registry.getSupportedExtensions();
            const detector = new FileChangeDetector(this.vcs, extensions);
            const fileChanges = await detector.getChangedFiles(beforeCommit, afterCommit);

            const [before, after] = await Promise.all([
                this.analyzeSide(beforeRef, beforeCommit),
                this.analyzeSide(afterRef, afterCommit),
            ]);

            const symbolChanges = diffSymbols(before.universe, after.universe);
            const counts = countChanges(symbolChanges);
            log.info('Symbol changes', { added: counts.ADDED, modified: counts.MODIFIED, deleted: counts.DELETED });

            const [beforeDescription, afterDescription] = await Promise.all([
                this.refs.describe(beforeRef),
                this.refs.describe(afterRef),
            ]);

            return {
                beforeRef,
                afterRef,
                beforeCommit,
                afterCommit,
                beforeDescription,
                afterDescription,
                fileChanges,
                symbolChanges,
                beforeTrees: this.treesFor(before, symbolChanges, 'before'),
                afterTrees: this.treesFor(after, symbolChanges, 'after'),
                added: counts.ADDED,
                modified: counts.MODIFIED,
                deleted: counts.DELETED,
            };
        }, { beforeRef, afterRef });
    }

    /**
     * Symbol universe of one side. Committed states are analyzed in their
     * own extracted directory, removed afterwards.
     */
    private async analyzeSide(ref: string, commit: string | null): Promise<AnalyzedSide> {
        if (commit === null) {
            const tables = await this.createOrchestrator(this.projectRoot).analyze();
            return { tables, universe: flattenSymbolTables(tables) };
        }

        const tree = await this.materializer.materialize(commit, ref);
        try {
            const tables = await this.createOrchestrator(tree.root).analyze();
            return { tables, universe: flattenSymbolTables(tables) };
        } finally {
            await tree.dispose();
        }
    }

    private treesFor(analyzed: AnalyzedSide, changes: Map<string, SymbolChange>, side: DiffSide): CallTreeNode[] {
        const stamped = stampChanges(analyzed.universe, changes, side);
        log.debug('Stamped changes', { side, stamped });

        return buildCallTrees(getEntryPoints(analyzed.tables), analyzed.universe, {
            defaultDepth: this.config.defaultExpansionDepth,
        });
    }

    private createOrchestrator(root: string): AnalysisOrchestrator {
        return new AnalysisOrchestrator(root, {
            config: this.config,
            entryPointFilter: this.options.entryPointFilter,
            analyzers: this.options.analyzers,
            bridges: this.options.bridges,
        });
    }
}
