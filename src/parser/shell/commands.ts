/**
 * Shell Command Extraction
 *
 * Pattern-based (there is no AST for shell). Detects:
 *   - curl / wget requests -> HTTP:<METHOD>:<path>
 *   - python -m pkg.mod     -> PYTHON:pkg.mod
 *   - python path/to/x.py   -> PYTHON:path/to/x.py
 * Command words may carry a path (`/usr/bin/python3`, `./venv/bin/python`).
 */

import { toHttpMethod } from '../types';
import type { HttpMethod, ShellCommand, ShellCommandInfo } from '../types';

export interface LogicalLine {
    /** 1-based line where the logical line starts */
    line: number;
    text: string;
}

// Groups: separator, directory prefix, command word
const COMMAND_START = /(^|[\s;|&(`])((?:[\w.~-]*\/)*)(curl|wget|python[0-9.]*)(?=\s|$)/g;

const URL_PATH = /https?:\/\/[^/\s"']+(\/[^\s"'?#]*)?/;
const VARIABLE_PATH = /\$\{?[A-Za-z_][A-Za-z0-9_]*\}?(\/[^\s"'?#]*)/;
/** `localhost:8000/p`, `10.0.0.5/p`, `api.internal:9000` (a port or a path is required) */
const HOST_PATH = /(?:^|[\s"'=])(?:localhost|[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+)(:\d+)?(\/[^\s"'?#]*)?(?=[\s"'?#]|$)/g;

const CURL_METHOD = /(?:^|\s)(?:-X\s*|--request[\s=]+)["']?([A-Za-z]+)/;
const WGET_METHOD = /(?:^|\s)--method[\s=]+["']?([A-Za-z]+)/;

const PYTHON_MODULE = /^python[0-9.]*(?:\s+-[A-Za-z]+)*?\s+-m\s+([A-Za-z0-9_.]+)/;
const PYTHON_SCRIPT = /^python[0-9.]*(?:\s+-[A-Za-z]+)*\s+["']?([A-Za-z0-9_/.-]+\.py)\b/;

/**
 * Join backslash continuations and drop comment lines.
 */
export function logicalLines(content: string): LogicalLine[] {
    const result: LogicalLine[] = [];
    const lines = content.split(/\r?\n/);
    let pending: LogicalLine | null = null;

    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i];
        if (!pending && raw.trim().startsWith('#')) {
            continue;
        }

        const continues = raw.endsWith('\\');
        const text = continues ? raw.slice(0, -1) : raw;

        if (pending) {
            pending.text += ` ${text.trim()}`;
        } else {
            pending = { line: i + 1, text };
        }

        if (!continues) {
            result.push(pending);
            pending = null;
        }
    }

    if (pending) {
        result.push(pending);
    }
    return result;
}

/**
 * Request path of a URL, a `$VAR/path` argument or a scheme-less
 * `host[:port]/path`, without its query string.
 */
export function extractRequestPath(segment: string): string | null {
    const url = URL_PATH.exec(segment);
    if (url) {
        return url[1] ?? '/';
    }
    const variable = VARIABLE_PATH.exec(segment);
    if (variable) {
        return variable[1];
    }
    for (const host of segment.matchAll(HOST_PATH)) {
        if (host[1] !== undefined || host[2] !== undefined) {
            return host[2] ?? '/';
        }
    }
    return null;
}

function requestMethod(client: string, segment: string): HttpMethod {
    const match = (client === 'wget' ? WGET_METHOD : CURL_METHOD).exec(segment);
    return (match ? toHttpMethod(match[1]) : null) ?? 'GET';
}

function parseSegment(client: string, segment: string, line: number): ShellCommand | null {
    if (client === 'curl' || client === 'wget') {
        const requestPath = extractRequestPath(segment);
        if (requestPath === null) return null;
        return { type: 'http', client, method: requestMethod(client, segment), path: requestPath, line };
    }

    const module = PYTHON_MODULE.exec(segment);
    if (module) {
        return { type: 'python', form: 'module', target: module[1], line };
    }
    const script = PYTHON_SCRIPT.exec(segment);
    if (script) {
        return { type: 'python', form: 'script', target: script[1].replace(/^(\.\/)+/, ''), line };
    }
    return null;
}

/**
 * Commands of a script in source order. A logical line may hold several
 * (`curl a && curl b`); each runs up to the next command word.
 */
export function parseShellCommands(content: string): ShellCommand[] {
    const commands: ShellCommand[] = [];

    for (const { line, text } of logicalLines(content)) {
        const starts: Array<{ client: string; index: number }> = [];
        for (const match of text.matchAll(COMMAND_START)) {
            starts.push({ client: match[3], index: (match.index ?? 0) + match[1].length + match[2].length });
        }

        starts.forEach((start, i) => {
            const end = i + 1 < starts.length ? starts[i + 1].index : text.length;
            const command = parseSegment(start.client, text.slice(start.index, end), line);
            if (command) commands.push(command);
        });
    }

    return commands;
}

/**
 * Raw call text of a command.
 */
export function formatRawCall(command: ShellCommandInfo): string {
    return command.type === 'http'
        ? `HTTP:${command.method}:${command.path}`
        : `PYTHON:${command.target}`;
}

export const HTTP_CALL_PREFIX = 'HTTP:';
export const PYTHON_CALL_PREFIX = 'PYTHON:';

/**
 * Split an `HTTP:<METHOD>:<path>` raw call.
 */
export function parseHttpCall(rawCall: string): { method: string; path: string } | null {
    if (!rawCall.startsWith(HTTP_CALL_PREFIX)) return null;
    const rest = rawCall.slice(HTTP_CALL_PREFIX.length);
    const separator = rest.indexOf(':');
    if (separator <= 0) return null;
    return { method: rest.slice(0, separator), path: rest.slice(separator + 1) };
}
