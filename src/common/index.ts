/**
 * Common utilities shared across modules
 */

export {
    Logger,
    logger,
    createLogger,
    configureLogger,
    setLogLevel,
    getLogLevel,
    isLogLevel,
} from './logger';
export type { LogLevel, LogFormat, LogEntry, LoggerConfig } from './logger';

export {
    CallscopeError,
    NotARepositoryError,
    InvalidRefError,
    CommandError,
    ConfigError,
    errorMessage,
} from './errors';
export type { ErrorCode, CommandErrorDetails, AnalysisWarning, WarningKind } from './errors';

export {
    loadConfig,
    parseConfig,
    excludedDirsFor,
    DEFAULT_CONFIG,
    DEFAULT_EXCLUDED_DIRS,
    CONFIG_FILE_NAME,
    CALLSCOPE_ENV_VARS,
    MIN_EXPANSION_DEPTH,
    MAX_EXPANSION_DEPTH,
} from './config';
export type { CallscopeConfig, CallscopeConfigInput } from './config';

export { runCommand, runPipedCommands, DEFAULT_COMMAND_TIMEOUT_MS } from './process';
export type { CommandResult, RunOptions } from './process';
