/**
 * Version Control Interface
 *
 * The git operations the diff engine depends on. GitCli runs the real
 * commands; tests substitute an in-process fake.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CommandError, InvalidRefError, NotARepositoryError } from '../common/errors';
import { createLogger } from '../common/logger';
import { DEFAULT_COMMAND_TIMEOUT_MS, runCommand } from '../common/process';

const log = createLogger('git');

export interface RepositoryLayout {
    /** Absolute path of the repository's top-level directory */
    topLevel: string;
    /** Project path inside the repository, '' or ending in '/' */
    prefix: string;
}

export interface VersionControl {
    /**
     * @throws NotARepositoryError when the project is not inside a work tree
     */
    verifyRepository(): Promise<void>;

    layout(): Promise<RepositoryLayout>;

    /**
     * Full commit id for a ref.
     *
     * @throws InvalidRefError when the ref does not name a commit
     */
    resolveCommit(ref: string): Promise<string>;

    /** Symbolic name of a commit (`main~1`), null when it has none */
    nameOf(commit: string): Promise<string | null>;

    /** First line of the commit message */
    subjectOf(commit: string): Promise<string | null>;

    /**
     * Raw `--name-status` output between two states; null is the working
     * tree. Paths are relative to the project.
     */
    diffNameStatus(before: string | null, after: string | null): Promise<string>;
}

export interface GitCliOptions {
    timeoutMs?: number;
}

export class GitCli implements VersionControl {
    readonly projectRoot: string;
    private readonly timeoutMs: number;
    private cachedLayout: RepositoryLayout | null = null;

    constructor(projectRoot: string, options: GitCliOptions = {}) {
        this.projectRoot = path.resolve(projectRoot);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    }

    async verifyRepository(): Promise<void> {
        if (!fs.existsSync(this.projectRoot) || !fs.statSync(this.projectRoot).isDirectory()) {
            throw new NotARepositoryError(this.projectRoot);
        }

        const result = await this.git(['rev-parse', '--is-inside-work-tree'], 'Check git work tree', false);
        if (result.exitCode !== 0 || result.stdout.trim() !== 'true') {
            log.error('Not a git work tree', { path: this.projectRoot, stderr: result.stderr.trim() });
            throw new NotARepositoryError(this.projectRoot);
        }
    }

    async layout(): Promise<RepositoryLayout> {
        if (this.cachedLayout) return this.cachedLayout;

        const topLevel = await this.git(['rev-parse', '--show-toplevel'], 'Find repository root');
        const prefix = await this.git(['rev-parse', '--show-prefix'], 'Find project prefix');
        this.cachedLayout = { topLevel: topLevel.stdout.trim(), prefix: prefix.stdout.trim() };
        return this.cachedLayout;
    }

    async resolveCommit(ref: string): Promise<string> {
        // A leading dash would be read as an option
        if (ref.startsWith('-') || ref.trim() === '') {
            throw new InvalidRefError(ref, 'not a revision');
        }

        const result = await this.git(
            ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`],
            `Resolve git ref '${ref}'`,
            false
        );
        const sha = result.stdout.trim();
        if (result.exitCode !== 0 || sha === '') {
            throw new InvalidRefError(ref, result.stderr.trim() || 'unknown revision');
        }
        return sha;
    }

    async nameOf(commit: string): Promise<string | null> {
        const result = await this.git(['name-rev', '--name-only', commit], 'Get ref name', false);
        const name = result.stdout.trim();
        return result.exitCode === 0 && name !== '' && name !== 'undefined' ? name : null;
    }

    async subjectOf(commit: string): Promise<string | null> {
        const result = await this.git(['log', '-1', '--format=%s', commit], 'Get commit subject', false);
        const subject = result.stdout.trim();
        return result.exitCode === 0 && subject !== '' ? subject : null;
    }

    async diffNameStatus(before: string | null, after: string | null): Promise<string> {
        const args = ['diff', '--name-status', '-M', '--relative'];
        if (before !== null && after !== null) {
            args.push(before, after);
        } else if (before !== null) {
            args.push(before);
        } else if (after !== null) {
            args.push('-R', after);
        } else {
            return '';
        }
        args.push('--');

        const result = await this.git(args, 'Get changed files');
        return result.stdout;
    }

    private async git(args: string[], description: string, check = true) {
        try {
            return await runCommand(['git', ...args], {
                cwd: this.projectRoot,
                timeoutMs: this.timeoutMs,
                description,
                check,
            });
        } catch (error) {
            if (error instanceof CommandError) {
                log.error(description, { error: error.message });
            }
            throw error;
        }
    }
}
