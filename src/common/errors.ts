/**
 * Error Types
 *
 * Fatal conditions surface as typed errors carrying the offending path, ref or
 * command. Recoverable conditions (a file that does not parse, a bridge that
 * throws) are AnalysisWarning records instead and never abort a run.
 */

export type ErrorCode =
    | 'E_NOT_A_REPOSITORY'
    | 'E_INVALID_REF'
    | 'E_COMMAND_FAILED'
    | 'E_COMMAND_TIMEOUT'
    | 'E_CONFIG';

export class CallscopeError extends Error {
    constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Diffing was requested on a directory that is not inside a git work tree.
 */
export class NotARepositoryError extends CallscopeError {
    constructor(readonly path: string, options?: { cause?: unknown }) {
        super('E_NOT_A_REPOSITORY', `Not a git repository: ${path}`, options);
    }
}

export class InvalidRefError extends CallscopeError {
    constructor(readonly ref: string, detail?: string, options?: { cause?: unknown }) {
        super('E_INVALID_REF', `Invalid git ref '${ref}'${detail ? `: ${detail}` : ''}`, options);
    }
}

export interface CommandErrorDetails {
    command: readonly string[];
    cwd?: string;
    exitCode?: number | null;
    signal?: string | null;
    stderr?: string;
    timedOut?: boolean;
    timeoutMs?: number;
    /** Git ref the command was operating on, when there is one */
    ref?: string;
}

/**
 * An external process failed, was killed or ran past its timeout.
 */
export class CommandError extends CallscopeError {
    readonly command: readonly string[];
    readonly cwd?: string;
    readonly exitCode?: number | null;
    readonly stderr: string;
    readonly timedOut: boolean;
    readonly ref?: string;

    constructor(
        readonly description: string,
        private readonly details: CommandErrorDetails,
        options?: { cause?: unknown }
    ) {
        const commandText = details.command.join(' ');
        const lines = details.timedOut
            ? [`Command timed out after ${details.timeoutMs}ms: ${description}`]
            : [`Command failed: ${description}`];
        lines.push(`  Command: ${commandText}`);
        if (details.cwd) lines.push(`  CWD: ${details.cwd}`);
        if (details.ref) lines.push(`  Ref: ${details.ref}`);
        if (!details.timedOut) {
            if (details.signal) {
                lines.push(`  Signal: ${details.signal}`);
            } else {
                lines.push(`  Exit code: ${details.exitCode ?? 'unknown'}`);
            }
        }
        const stderr = details.stderr?.trim() ?? '';
        if (stderr) lines.push(`  Stderr: ${stderr}`);

        super(details.timedOut ? 'E_COMMAND_TIMEOUT' : 'E_COMMAND_FAILED', lines.join('\n'), options);
        this.command = details.command;
        this.cwd = details.cwd;
        this.exitCode = details.exitCode;
        this.stderr = stderr;
        this.timedOut = details.timedOut ?? false;
        this.ref = details.ref;
    }

    /**
     * Same failure, attributed to a git ref.
     */
    withRef(ref: string): CommandError {
        return new CommandError(this.description, { ...this.details, ref }, { cause: this });
    }
}

export class ConfigError extends CallscopeError {
    constructor(readonly source: string, readonly issues: string[]) {
        super('E_CONFIG', `Invalid configuration in ${source}: ${issues.join(', ')}`);
    }
}

// ============================================================================
// Recoverable Warnings
// ============================================================================

export type WarningKind = 'read' | 'parse' | 'bridge';

export interface AnalysisWarning {
    kind: WarningKind;
    /** File path for read/parse warnings, bridge name for bridge warnings */
    source: string;
    message: string;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
