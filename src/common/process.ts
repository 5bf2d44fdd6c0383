/**
 * External Process Runner
 *
 * Thin wrappers over child_process with bounded timeouts. A failure, a
 * non-zero exit or a timeout rejects with CommandError; nothing is retried.
 */

import * as child_process from 'child_process';
import * as util from 'util';
import { CommandError } from './errors';
import { createLogger } from './logger';

const execFile = util.promisify(child_process.execFile);
const log = createLogger('process');

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

export interface CommandResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    command: readonly string[];
}

export interface RunOptions {
    cwd?: string;
    timeoutMs?: number;
    /** Human-readable description for logs and errors */
    description?: string;
    /** Reject on non-zero exit (default: true) */
    check?: boolean;
}

interface ExecFailure {
    code?: number | string;
    killed?: boolean;
    signal?: string | null;
    stdout?: string;
    stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
    return error instanceof Error;
}

/**
 * Run a command and capture its output.
 */
export async function runCommand(command: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const [file, ...args] = command;
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    const description = options.description ?? command.join(' ');
    const check = options.check ?? true;

    log.debug('Running command', { description, command: command.join(' '), cwd: options.cwd, timeoutMs });

    try {
        const { stdout, stderr } = await execFile(file, args, {
            cwd: options.cwd,
            timeout: timeoutMs,
            maxBuffer: 64 * 1024 * 1024,
            encoding: 'utf8',
        });
        return { stdout, stderr, exitCode: 0, command };
    } catch (error) {
        if (!isExecFailure(error)) throw error;

        const timedOut = error.killed === true && error.signal === 'SIGTERM';
        const exitCode = typeof error.code === 'number' ? error.code : null;

        if (!timedOut && !check && exitCode !== null) {
            return { stdout: error.stdout ?? '', stderr: error.stderr ?? '', exitCode, command };
        }

        const failure = new CommandError(description, {
            command,
            cwd: options.cwd,
            exitCode,
            signal: timedOut ? null : error.signal,
            // ENOENT and friends arrive as a string code with no stderr
            stderr: error.stderr || (typeof error.code === 'string' ? `${error.code}: ${error.message}` : ''),
            timedOut,
            timeoutMs,
        }, { cause: error });
        log.debug('Command failed', { description, error: failure.message });
        throw failure;
    }
}

/**
 * Pipe the stdout of `producer` into the stdin of `consumer`
 * (e.g. `git archive <sha> | tar -x -C <dir>`).
 *
 * Both processes are killed when the timeout elapses.
 */
export function runPipedCommands(
    producer: readonly string[],
    consumer: readonly string[],
    options: RunOptions = {}
): Promise<void> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    const description = options.description ?? `${producer.join(' ')} | ${consumer.join(' ')}`;

    log.debug('Running piped commands', { description, cwd: options.cwd, timeoutMs });

    return new Promise<void>((resolve, reject) => {
        const source = child_process.spawn(producer[0], producer.slice(1), {
            cwd: options.cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        const sink = child_process.spawn(consumer[0], consumer.slice(1), {
            cwd: options.cwd,
            stdio: ['pipe', 'ignore', 'pipe'],
        });

        let settled = false;
        let pending = 2;
        const stderr = { source: '', sink: '' };
        const exits: { source?: ExitInfo; sink?: ExitInfo } = {};

        const fail = (error: CommandError) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            source.kill();
            sink.kill();
            reject(error);
        };

        const timer = setTimeout(() => {
            fail(new CommandError(description, {
                command: [...producer, '|', ...consumer],
                cwd: options.cwd,
                timedOut: true,
                timeoutMs,
            }));
        }, timeoutMs);

        const finish = () => {
            if (settled || pending > 0) return;
            const stages: Array<['source' | 'sink', readonly string[]]> = [['source', producer], ['sink', consumer]];
            for (const [stage, command] of stages) {
                const exit = exits[stage];
                if (exit && exit.code !== 0) {
                    fail(new CommandError(description, {
                        command,
                        cwd: options.cwd,
                        exitCode: exit.code,
                        signal: exit.signal,
                        stderr: stderr[stage],
                    }));
                    return;
                }
            }
            settled = true;
            clearTimeout(timer);
            resolve();
        };

        source.stdout.pipe(sink.stdin);
        // tar exiting early closes the pipe; the exit codes tell the story
        sink.stdin.on('error', () => undefined);

        source.stderr.on('data', (chunk: Buffer) => { stderr.source += chunk.toString(); });
        sink.stderr.on('data', (chunk: Buffer) => { stderr.sink += chunk.toString(); });

        const watch = (stage: 'source' | 'sink', proc: child_process.ChildProcess, command: readonly string[]) => {
            proc.on('error', (error) => {
                fail(new CommandError(description, {
                    command,
                    cwd: options.cwd,
                    stderr: error.message,
                }, { cause: error }));
            });
            proc.on('close', (code, signal) => {
                exits[stage] = { code, signal };
                pending--;
                finish();
            });
        };
        watch('source', source, producer);
        watch('sink', sink, consumer);
    });
}

interface ExitInfo {
    code: number | null;
    signal: NodeJS.Signals | null;
}
