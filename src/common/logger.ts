/**
 * Structured Logger
 *
 * Leveled, colored logging for the analysis pipeline. Lines go to stderr so
 * that stdout stays free for whatever a consumer prints.
 *
 * Usage:
 *   import { createLogger } from './common/logger';
 *
 *   const log = createLogger('orchestrator');
 *   log.info('Discovered files', { count: 42 });
 *   log.warn('Could not parse file', { file: 'api.py', error: err.message });
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export interface LogEntry {
    level: LogLevel;
    scope: string;
    message: string;
    data?: Record<string, unknown>;
    timestamp: string;
    durationMs?: number;
}

export interface LoggerConfig {
    /** Minimum level to log (default: 'info') */
    level: LogLevel;
    /** Output format: 'pretty' for console, 'json' for structured (default: 'pretty') */
    format: LogFormat;
    /** Whether to include timestamps (default: true) */
    timestamps: boolean;
    /** Custom output function (default: console.error) */
    output?: (line: string) => void;
}

// ============================================================================
// Log Level Utilities
// ============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: '\x1b[90m',  // gray
    info: '\x1b[36m',   // cyan
    warn: '\x1b[33m',   // yellow
    error: '\x1b[31m',  // red
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    debug: 'DBG',
    info: 'INF',
    warn: 'WRN',
    error: 'ERR',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LEVEL_PRIORITY;
}

function isLogFormat(value: unknown): value is LogFormat {
    return value === 'pretty' || value === 'json';
}

// ============================================================================
// Global Configuration
// ============================================================================

let globalConfig: LoggerConfig = {
    level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
    format: isLogFormat(process.env.LOG_FORMAT) ? process.env.LOG_FORMAT : 'pretty',
    timestamps: true,
    output: (line) => console.error(line),
};

/**
 * Configure global logger settings
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
    globalConfig = { ...globalConfig, ...config };
}

export function setLogLevel(level: LogLevel): void {
    globalConfig.level = level;
}

export function getLogLevel(): LogLevel {
    return globalConfig.level;
}

// ============================================================================
// Formatting
// ============================================================================

function formatTimestamp(): string {
    const now = new Date();
    const h = now.getHours().toString().padStart(2, '0');
    const m = now.getMinutes().toString().padStart(2, '0');
    const s = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${h}:${m}:${s}.${ms}`;
}

function formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
        if (value === undefined) continue;
        const strVal = typeof value === 'string' ? value : JSON.stringify(value);
        // Truncate long values
        const display = strVal.length > 120 ? strVal.slice(0, 117) + '...' : strVal;
        parts.push(`${key}=${display}`);
    }
    return parts.join(' ');
}

function formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (globalConfig.timestamps) {
        parts.push(`${DIM}${entry.timestamp}${RESET}`);
    }

    parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${RESET}`);

    if (entry.scope) {
        parts.push(`${DIM}[${entry.scope}]${RESET}`);
    }

    parts.push(entry.message);

    if (entry.durationMs !== undefined) {
        parts.push(`${DIM}(${entry.durationMs}ms)${RESET}`);
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
        parts.push(`${DIM}${formatData(entry.data)}${RESET}`);
    }

    return parts.join(' ');
}

function formatJson(entry: LogEntry): string {
    return JSON.stringify({
        ts: entry.timestamp,
        level: entry.level,
        scope: entry.scope || undefined,
        msg: entry.message,
        ...entry.data,
        durationMs: entry.durationMs,
    });
}

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
    constructor(private scope: string = '') {}

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[globalConfig.level];
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>, durationMs?: number): void {
        if (!this.shouldLog(level)) return;

        const entry: LogEntry = {
            level,
            scope: this.scope,
            message,
            data,
            timestamp: formatTimestamp(),
            durationMs,
        };

        const line = globalConfig.format === 'json'
            ? formatJson(entry)
            : formatPretty(entry);

        globalConfig.output?.(line);
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.log('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.log('error', message, data);
    }

    /**
     * Create a child logger with additional scope
     */
    child(childScope: string): Logger {
        const newScope = this.scope ? `${this.scope}:${childScope}` : childScope;
        return new Logger(newScope);
    }

    /**
     * Time an async operation. Failures are logged and rethrown.
     */
    async time<T>(
        message: string,
        fn: () => Promise<T>,
        data?: Record<string, unknown>
    ): Promise<T> {
        const start = Date.now();
        try {
            const result = await fn();
            this.log('info', message, data, Date.now() - start);
            return result;
        } catch (error) {
            this.log('error', `${message} (failed)`, {
                ...data,
                error: error instanceof Error ? error.message : String(error),
            }, Date.now() - start);
            throw error;
        }
    }
}

// ============================================================================
// Factory and Default Instance
// ============================================================================

/**
 * Create a scoped logger
 */
export function createLogger(scope: string): Logger {
    return new Logger(scope);
}

/**
 * Default global logger (no scope)
 */
export const logger = new Logger();

export default logger;
