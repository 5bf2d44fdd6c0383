/**
 * File Change Detection
 *
 * Lists the files that differ between two states, restricted to the
 * extensions an analyzer owns.
 */

import * as path from 'path';
import { createLogger } from '../common/logger';
import type { VersionControl } from './version-control';

const log = createLogger('git:files');

export type FileChangeType = 'A' | 'M' | 'D' | 'R';

export interface FileChange {
    path: string;
    changeType: FileChangeType;
    /** Previous path, for renames */
    oldPath?: string;
}

/**
 * Parse one `git diff --name-status` line. Unknown statuses give null.
 */
export function parseNameStatusLine(line: string): FileChange | null {
    const parts = line.split('\t');
    if (parts.length < 2) return null;

    const status = parts[0].charAt(0);
    switch (status) {
        case 'A':
        case 'M':
        case 'D':
            return { path: parts[1], changeType: status };
        case 'R':
            if (parts.length < 3) return null;
            return { path: parts[2], changeType: 'R', oldPath: parts[1] };
        default:
            return null;
    }
}

export class FileChangeDetector {
    private readonly extensions: Set<string>;

    constructor(private readonly vcs: VersionControl, extensions: readonly string[]) {
        this.extensions = new Set(extensions.map(ext => ext.toLowerCase()));
    }

    /**
     * @param before commit id, or null for the working tree
     * @param after commit id, or null for the working tree
     */
    async getChangedFiles(before: string | null, after: string | null): Promise<FileChange[]> {
        const output = await this.vcs.diffNameStatus(before, after);
        const changes: FileChange[] = [];

        for (const line of output.split('\n')) {
            if (!line.trim()) continue;
            const change = parseNameStatusLine(line);
            if (!change) {
                log.debug('Ignoring diff line', { line });
                continue;
            }
            if (this.isSupported(change.path) || (change.oldPath !== undefined && this.isSupported(change.oldPath))) {
                changes.push(change);
            }
        }

        log.debug('Changed files', { before, after, count: changes.length });
        return changes;
    }

    private isSupported(filePath: string): boolean {
        return this.extensions.has(path.posix.extname(filePath).toLowerCase());
    }
}
