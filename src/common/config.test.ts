import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { after, before, describe, test } from 'node:test';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, excludedDirsFor, loadConfig, parseConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
    let root: string;

    before(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'callscope-config-'));
    });

    after(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    const writeConfig = (content: string) => {
        fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), content);
    };

    test('uses defaults without a file or environment', () => {
        const config = loadConfig(undefined, {});
        assert.deepEqual(config, DEFAULT_CONFIG);
        assert.equal(config.defaultExpansionDepth, 6);
        assert.equal(config.maxConcurrency, 8);
        assert.equal(config.workingTreeRef, 'working');
    });

    test('environment overrides the project file', () => {
        writeConfig(JSON.stringify({ defaultExpansionDepth: 8, maxConcurrency: 2 }));

        const config = loadConfig(root, { CALLSCOPE_EXPANSION_DEPTH: '10' });

        assert.equal(config.defaultExpansionDepth, 10);
        assert.equal(config.maxConcurrency, 2);
    });

    test('rejects an expansion depth above the bound', () => {
        writeConfig('{}');

        assert.throws(
            () => loadConfig(root, { CALLSCOPE_EXPANSION_DEPTH: '21' }),
            (error: unknown) => error instanceof ConfigError
                && error.code === 'E_CONFIG'
                && error.issues.length === 1
                && error.issues[0].startsWith('defaultExpansionDepth:')
        );
    });

    test('rejects non-numeric environment values', () => {
        writeConfig('{}');
        assert.throws(() => loadConfig(root, { CALLSCOPE_COMMAND_TIMEOUT_MS: 'soon' }), ConfigError);
    });

    test('rejects unknown keys', () => {
        writeConfig(JSON.stringify({ expansionDepth: 3 }));
        assert.throws(() => loadConfig(root, {}), ConfigError);
    });

    test('reports malformed JSON against the file', () => {
        writeConfig('{ not json');
        assert.throws(
            () => loadConfig(root, {}),
            (error: unknown) => error instanceof ConfigError && error.source === path.join(root, CONFIG_FILE_NAME)
        );
    });

    test('requires a JSON object', () => {
        writeConfig('[1, 2]');
        assert.throws(
            () => loadConfig(root, {}),
            (error: unknown) => error instanceof ConfigError && error.issues[0] === 'expected a JSON object'
        );
    });

    test('adds excluded directories from the environment to the defaults', () => {
        writeConfig('{}');
        const config = loadConfig(root, { CALLSCOPE_EXCLUDED_DIRS: 'fixtures, generated,' });

        assert.deepEqual(config.excludedDirs, ['fixtures', 'generated']);
        const excluded = excludedDirsFor(config);
        assert.ok(excluded.has('fixtures'));
        assert.ok(excluded.has('generated'));
        assert.ok(excluded.has('.git'));
        assert.ok(excluded.has('__pycache__'));
    });

    test('reads the log level from LOG_LEVEL', () => {
        writeConfig('{}');
        assert.equal(loadConfig(root, { LOG_LEVEL: 'debug' }).logLevel, 'debug');
        assert.throws(() => loadConfig(root, { LOG_LEVEL: 'verbose' }), ConfigError);
    });
});

describe('parseConfig', () => {
    test('fills in defaults for a partial object', () => {
        const config = parseConfig({ archiveTimeoutMs: 5000 });
        assert.equal(config.archiveTimeoutMs, 5000);
        assert.equal(config.commandTimeoutMs, 60_000);
    });

    test('names the source in the error', () => {
        assert.throws(
            () => parseConfig({ maxConcurrency: 0 }, 'test options'),
            (error: unknown) => error instanceof ConfigError && error.message.startsWith('Invalid configuration in test options: maxConcurrency:')
        );
    });
});
