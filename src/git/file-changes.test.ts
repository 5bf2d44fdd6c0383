import { strict as assert } from 'assert';
import { describe, test } from 'node:test';
import { FileChangeDetector, parseNameStatusLine } from './file-changes';
import type { RepositoryLayout, VersionControl } from './version-control';

/**
 * Answers every diff with fixed output and records what was asked.
 */
class StaticDiff implements VersionControl {
    readonly requests: Array<[string | null, string | null]> = [];

    constructor(private readonly output: string) {}

    async verifyRepository(): Promise<void> {}

    async layout(): Promise<RepositoryLayout> {
        return { topLevel: '/repo', prefix: '' };
    }

    async resolveCommit(ref: string): Promise<string> {
        return ref;
    }

    async nameOf(): Promise<string | null> {
        return null;
    }

    async subjectOf(): Promise<string | null> {
        return null;
    }

    async diffNameStatus(before: string | null, after: string | null): Promise<string> {
        this.requests.push([before, after]);
        return this.output;
    }
}

describe('parseNameStatusLine', () => {
    test('reads added, modified and deleted files', () => {
        assert.deepEqual(parseNameStatusLine('A\tsrc/new.py'), { path: 'src/new.py', changeType: 'A' });
        assert.deepEqual(parseNameStatusLine('M\tsrc/api.py'), { path: 'src/api.py', changeType: 'M' });
        assert.deepEqual(parseNameStatusLine('D\told.sh'), { path: 'old.sh', changeType: 'D' });
    });

    test('keeps both paths of a rename', () => {
        assert.deepEqual(parseNameStatusLine('R092\tlib/a.py\tlib/b.py'), {
            path: 'lib/b.py',
            changeType: 'R',
            oldPath: 'lib/a.py',
        });
        assert.equal(parseNameStatusLine('R100\tlib/a.py'), null);
    });

    test('ignores other statuses and malformed lines', () => {
        assert.equal(parseNameStatusLine('C075\ta.py\tb.py'), null);
        assert.equal(parseNameStatusLine('T\tlink.py'), null);
        assert.equal(parseNameStatusLine('M src/api.py'), null);
    });
});

describe('FileChangeDetector', () => {
    test('keeps changes to files an analyzer owns', async () => {
        const vcs = new StaticDiff([
            'M\tapi.py',
            'A\tREADME.md',
            'D\tscripts/Deploy.SH',
            'R100\tscripts/run.sh\tscripts/run.txt',
            'R090\tnotes.txt\tnotes.md',
            'X\tweird.py',
            '',
        ].join('\n'));
        const detector = new FileChangeDetector(vcs, ['.py', '.sh']);

        const changes = await detector.getChangedFiles('a1b2c3d', null);

        assert.deepEqual(changes, [
            { path: 'api.py', changeType: 'M' },
            { path: 'scripts/Deploy.SH', changeType: 'D' },
            { path: 'scripts/run.txt', changeType: 'R', oldPath: 'scripts/run.sh' },
        ]);
        assert.deepEqual(vcs.requests, [['a1b2c3d', null]]);
    });

    test('returns nothing for an empty diff', async () => {
        const detector = new FileChangeDetector(new StaticDiff(''), ['.py']);
        assert.deepEqual(await detector.getChangedFiles(null, null), []);
    });
});
