/**
 * Configuration
 *
 * Loads and validates analysis settings.
 *
 * Priority (highest first):
 * 1. Environment variables (CALLSCOPE_*, LOG_LEVEL)
 * 2. .callscope.json in the project root
 * 3. Defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { z, ZodError } from 'zod';
import { ConfigError } from './errors';

export const CONFIG_FILE_NAME = '.callscope.json';

export const MIN_EXPANSION_DEPTH = 1;
export const MAX_EXPANSION_DEPTH = 20;

/**
 * Directory names never descended into during discovery. Hidden directories
 * are skipped as well.
 */
export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
    '.git',
    '.hg',
    '.svn',
    'venv',
    '.venv',
    'env',
    'node_modules',
    '__pycache__',
    '.pytest_cache',
    '.mypy_cache',
    '.tox',
    'build',
    'dist',
];

const configSchema = z.object({
    defaultExpansionDepth: z.number().int().min(MIN_EXPANSION_DEPTH).max(MAX_EXPANSION_DEPTH).default(6),
    commandTimeoutMs: z.number().int().positive().default(60_000),
    archiveTimeoutMs: z.number().int().positive().default(30_000),
    excludedDirs: z.array(z.string().min(1)).default([]),
    maxConcurrency: z.number().int().min(1).max(64).default(8),
    workingTreeRef: z.string().min(1).default('working'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
}).strict();

export type CallscopeConfig = z.infer<typeof configSchema>;

/** The input shape: every key optional */
export type CallscopeConfigInput = z.input<typeof configSchema>;

export const DEFAULT_CONFIG: CallscopeConfig = configSchema.parse({});

/**
 * Environment variables read by loadConfig
 */
export const CALLSCOPE_ENV_VARS = {
    EXPANSION_DEPTH: 'CALLSCOPE_EXPANSION_DEPTH',
    COMMAND_TIMEOUT_MS: 'CALLSCOPE_COMMAND_TIMEOUT_MS',
    ARCHIVE_TIMEOUT_MS: 'CALLSCOPE_ARCHIVE_TIMEOUT_MS',
    EXCLUDED_DIRS: 'CALLSCOPE_EXCLUDED_DIRS',
    MAX_CONCURRENCY: 'CALLSCOPE_MAX_CONCURRENCY',
    LOG_LEVEL: 'LOG_LEVEL',
} as const;

function formatIssues(error: ZodError): string[] {
    return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Validate a partial configuration object and fill in defaults.
 */
export function parseConfig(input: unknown, source = 'options'): CallscopeConfig {
    const result = configSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(source, formatIssues(result.error));
    }
    return result.data;
}

function readConfigFile(projectRoot: string): Record<string, unknown> {
    const filePath = path.join(projectRoot, CONFIG_FILE_NAME);
    if (!fs.existsSync(filePath)) {
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(filePath, [error instanceof Error ? error.message : String(error)]);
    }

    const record = z.record(z.unknown()).safeParse(parsed);
    if (!record.success) {
        throw new ConfigError(filePath, ['expected a JSON object']);
    }
    return record.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const values: Record<string, unknown> = {};

    const numeric: Array<[keyof CallscopeConfig, string]> = [
        ['defaultExpansionDepth', CALLSCOPE_ENV_VARS.EXPANSION_DEPTH],
        ['commandTimeoutMs', CALLSCOPE_ENV_VARS.COMMAND_TIMEOUT_MS],
        ['archiveTimeoutMs', CALLSCOPE_ENV_VARS.ARCHIVE_TIMEOUT_MS],
        ['maxConcurrency', CALLSCOPE_ENV_VARS.MAX_CONCURRENCY],
    ];
    for (const [key, name] of numeric) {
        const raw = env[name];
        if (raw !== undefined && raw.trim() !== '') {
            // Non-numeric text becomes NaN and is reported by the schema
            values[key] = Number(raw);
        }
    }

    const dirs = env[CALLSCOPE_ENV_VARS.EXCLUDED_DIRS];
    if (dirs) {
        values.excludedDirs = dirs.split(',').map(d => d.trim()).filter(Boolean);
    }

    const level = env[CALLSCOPE_ENV_VARS.LOG_LEVEL];
    if (level) {
        values.logLevel = level;
    }

    return values;
}

/**
 * Load configuration for a project.
 *
 * @param projectRoot Directory searched for .callscope.json (skipped when omitted)
 * @param env Environment to read (default: process.env)
 */
export function loadConfig(projectRoot?: string, env: NodeJS.ProcessEnv = process.env): CallscopeConfig {
    const fromFile = projectRoot ? readConfigFile(projectRoot) : {};
    const fromEnv = readEnv(env);

    const merged = { ...fromFile, ...fromEnv };
    const source = projectRoot ? `${path.join(projectRoot, CONFIG_FILE_NAME)} / environment` : 'environment';
    return parseConfig(merged, source);
}

/**
 * Directory names excluded from discovery for a configuration.
 */
export function excludedDirsFor(config: CallscopeConfig): Set<string> {
    return new Set([...DEFAULT_EXCLUDED_DIRS, ...config.excludedDirs]);
}
