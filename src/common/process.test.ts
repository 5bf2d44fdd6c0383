import { strict as assert } from 'assert';
import { describe, test } from 'node:test';
import { CommandError } from './errors';
import { runCommand, runPipedCommands } from './process';

describe('runCommand', () => {
    test('rejects with CommandError when the executable is missing', async () => {
        await assert.rejects(
            runCommand(['callscope-missing-executable', '--version'], { description: 'Tool version' }),
            (error: unknown) => {
                assert.ok(error instanceof CommandError);
                assert.equal(error.code, 'E_COMMAND_FAILED');
                assert.equal(error.timedOut, false);
                assert.equal(error.exitCode, null);
                assert.deepEqual(error.command, ['callscope-missing-executable', '--version']);
                assert.ok(error.stderr.startsWith('ENOENT:'));
                assert.ok(error.message.startsWith('Command failed: Tool version\n'));
                return true;
            }
        );
    });
});

describe('runPipedCommands', () => {
    test('resolves when both sides exit cleanly', async () => {
        await runPipedCommands(['echo', 'payload'], ['cat']);
    });

    test('kills both sides when the timeout elapses', async () => {
        const started = Date.now();
        await assert.rejects(
            runPipedCommands(['sleep', '5'], ['cat'], { timeoutMs: 200, description: 'Slow pipe' }),
            (error: unknown) => {
                assert.ok(error instanceof CommandError);
                assert.equal(error.code, 'E_COMMAND_TIMEOUT');
                assert.equal(error.timedOut, true);
                assert.deepEqual(error.command, ['sleep', '5', '|', 'cat']);
                assert.equal(error.message, 'Command timed out after 200ms: Slow pipe\n  Command: sleep 5 | cat');
                return true;
            }
        );
        assert.ok(Date.now() - started < 4000);
    });

    test('reports the producer\'s exit code and stderr', async () => {
        await assert.rejects(
            runPipedCommands(['sh', '-c', 'echo oops >&2; exit 3'], ['cat'], { description: 'Export' }),
            (error: unknown) => {
                assert.ok(error instanceof CommandError);
                assert.equal(error.code, 'E_COMMAND_FAILED');
                assert.deepEqual(error.command, ['sh', '-c', 'echo oops >&2; exit 3']);
                assert.equal(error.exitCode, 3);
                assert.equal(error.stderr, 'oops');
                return true;
            }
        );
    });

    test('reports a failing consumer', async () => {
        const consumer = ['sh', '-c', 'cat > /dev/null; echo "cannot unpack" >&2; exit 2'];
        await assert.rejects(
            runPipedCommands(['echo', 'payload'], consumer),
            (error: unknown) => {
                assert.ok(error instanceof CommandError);
                assert.deepEqual(error.command, consumer);
                assert.equal(error.exitCode, 2);
                assert.equal(error.stderr, 'cannot unpack');
                return true;
            }
        );
    });

    test('rejects when a side cannot be started', async () => {
        await assert.rejects(
            runPipedCommands(['echo', 'payload'], ['callscope-missing-executable']),
            (error: unknown) => {
                assert.ok(error instanceof CommandError);
                assert.deepEqual(error.command, ['callscope-missing-executable']);
                assert.equal(error.stderr, 'spawn callscope-missing-executable ENOENT');
                return true;
            }
        );
    });
});

describe('CommandError', () => {
    test('lists command, directory and exit status', () => {
        const error = new CommandError('Resolve git ref', {
            command: ['git', 'rev-parse', 'nope'],
            cwd: '/work/project',
            exitCode: 128,
            stderr: 'fatal: bad revision\n',
        });

        assert.equal(error.message, [
            'Command failed: Resolve git ref',
            '  Command: git rev-parse nope',
            '  CWD: /work/project',
            '  Exit code: 128',
            '  Stderr: fatal: bad revision',
        ].join('\n'));
        assert.equal(error.stderr, 'fatal: bad revision');
        assert.equal(error.name, 'CommandError');
    });

    test('reports timeouts with their own code', () => {
        const error = new CommandError('Extract HEAD~1', {
            command: ['git', 'archive', 'abc123'],
            timedOut: true,
            timeoutMs: 500,
        });

        assert.equal(error.code, 'E_COMMAND_TIMEOUT');
        assert.equal(error.message, 'Command timed out after 500ms: Extract HEAD~1\n  Command: git archive abc123');
    });

    test('withRef attributes the failure to a ref', () => {
        const original = new CommandError('Extract', { command: ['tar', '-x'], exitCode: 2 });
        const attributed = original.withRef('feature/login');

        assert.equal(attributed.ref, 'feature/login');
        assert.equal(attributed.exitCode, 2);
        assert.equal(attributed.cause, original);
        assert.ok(attributed.message.includes('\n  Ref: feature/login\n'));
    });
});
