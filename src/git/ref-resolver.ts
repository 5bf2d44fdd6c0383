/**
 * Git Ref Resolver
 *
 * Resolves ref strings to commit ids. The working-tree token resolves to
 * null: that side is analyzed in place instead of being extracted.
 */

import type { VersionControl } from './version-control';

export const WORKING_TREE_DESCRIPTION = 'Working directory (uncommitted changes)';

const MAX_SUBJECT_LENGTH = 60;

export class GitRefResolver {
    constructor(
        private readonly vcs: VersionControl,
        readonly workingTreeRef: string = 'working'
    ) {}

    isWorkingTree(ref: string): boolean {
        return ref === this.workingTreeRef;
    }

    /**
     * @returns commit id, or null for the working tree
     * @throws InvalidRefError
     */
    async resolve(ref: string): Promise<string | null> {
        if (this.isWorkingTree(ref)) return null;
        return this.vcs.resolveCommit(ref);
    }

    /**
     * Human-readable description, e.g. "HEAD~1 (main~1, b824117) - Fix parser".
     */
    async describe(ref: string): Promise<string> {
        const commit = await this.resolve(ref);
        if (commit === null) return WORKING_TREE_DESCRIPTION;

        const shortSha = commit.slice(0, 7);
        const [name, subject] = await Promise.all([this.vcs.nameOf(commit), this.vcs.subjectOf(commit)]);
        const message = subject !== null && subject.length > MAX_SUBJECT_LENGTH
            ? `${subject.slice(0, MAX_SUBJECT_LENGTH - 3)}...`
            : subject;

        const inner = name ? `${name}, ${shortSha}` : shortSha;
        return message ? `${ref} (${inner}) - ${message}` : `${ref} (${inner})`;
    }
}
