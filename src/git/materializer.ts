/**
 * Ref Materialization
 *
 * Extracts the tree of a commit into a private temporary directory so the
 * pipeline can run on it without touching the work tree.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandError } from '../common/errors';
import { createLogger } from '../common/logger';
import { runPipedCommands } from '../common/process';
import type { VersionControl } from './version-control';

const log = createLogger('git:materialize');

export interface MaterializedTree {
    /** Directory corresponding to the project root at that commit */
    root: string;
    /** Remove the extracted files */
    dispose(): Promise<void>;
}

export interface RefMaterializer {
    /**
     * @param commit resolved commit id
     * @param ref the ref as the caller wrote it, for error reports
     */
    materialize(commit: string, ref: string): Promise<MaterializedTree>;
}

export interface GitArchiveOptions {
    timeoutMs?: number;
    /** Parent of the temporary directories (default: os.tmpdir()) */
    tmpDir?: string;
}

/**
 * `git archive <commit> | tar -x -C <tmp>`
 */
export class GitArchiveMaterializer implements RefMaterializer {
    constructor(
        private readonly vcs: VersionControl,
        private readonly options: GitArchiveOptions = {}
    ) {}

    async materialize(commit: string, ref: string): Promise<MaterializedTree> {
        const { topLevel, prefix } = await this.vcs.layout();
        const dir = await fs.promises.mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), 'callscope-'));
        const dispose = () => fs.promises.rm(dir, { recursive: true, force: true });

        try {
            await runPipedCommands(['git', 'archive', commit], ['tar', '-x', '-C', dir], {
                cwd: topLevel,
                timeoutMs: this.options.timeoutMs,
                description: `Extract ${ref}`,
            });
        } catch (error) {
            await dispose();
            throw error instanceof CommandError ? error.withRef(ref) : error;
        }

        // The project directory may not exist yet at that commit
        const root = path.join(dir, prefix);
        await fs.promises.mkdir(root, { recursive: true });

        log.debug('Materialized ref', { ref, commit, dir, prefix });
        return { root, dispose };
    }
}
