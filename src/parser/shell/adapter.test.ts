/**
 * Shell analyzer: command extraction and one-symbol-per-script tables.
 */

import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { after, before, describe, test } from 'node:test';
import { ShellAnalyzer } from './adapter';
import { extractRequestPath, logicalLines, parseHttpCall, parseShellCommands } from './commands';

const ANALYZE_SCRIPT = [
    '#!/bin/bash',
    '# curl http://localhost:8000/ignored',
    'API=http://localhost:8000',
    'curl -X POST http://localhost:8000/analyze \\',
    '  -H "Content-Type: application/json" \\',
    `  -d '{"ticker": "ACME"}'`,
    'wget --method=PUT "${API}/jobs/7?force=1"',
    'curl "$API/status" && python3 -m tools.report --verbose',
    'python ./jobs/nightly.py',
    '',
].join('\n');

describe('shell command extraction', () => {
    test('joins continuations and skips comments', () => {
        const lines = logicalLines('# note\necho a \\\n  b\necho c\n');
        assert.deepEqual(lines, [
            { line: 2, text: 'echo a  b' },
            { line: 4, text: 'echo c' },
            { line: 5, text: '' },
        ]);
    });

    test('extracts requests and interpreter calls in source order', () => {
        assert.deepEqual(parseShellCommands(ANALYZE_SCRIPT), [
            { type: 'http', client: 'curl', method: 'POST', path: '/analyze', line: 4 },
            { type: 'http', client: 'wget', method: 'PUT', path: '/jobs/7', line: 7 },
            { type: 'http', client: 'curl', method: 'GET', path: '/status', line: 8 },
            { type: 'python', form: 'module', target: 'tools.report', line: 8 },
            { type: 'python', form: 'script', target: 'jobs/nightly.py', line: 9 },
        ]);
    });

    test('finds request paths', () => {
        assert.equal(extractRequestPath('curl https://api.example.test'), '/');
        assert.equal(extractRequestPath('curl http://host:9000/v1/items?page=2'), '/v1/items');
        assert.equal(extractRequestPath('curl ${BASE_URL}/health'), '/health');
        assert.equal(extractRequestPath('curl localhost/health'), '/health');
        assert.equal(extractRequestPath('curl -s 10.0.0.5:8080'), '/');
        assert.equal(extractRequestPath('curl -o out.json api.internal:9000/v1/jobs?all=1'), '/v1/jobs');
        assert.equal(extractRequestPath('curl -o out.json -H "Accept: application/json"'), null);
    });

    test('accepts scheme-less URLs and interpreters called by path', () => {
        const script = [
            'curl -X POST localhost:8000/analyze',
            'curl -X DELETE 127.0.0.1:8000/jobs/7?force=1',
            '/usr/bin/python3 tools/report.py',
            './venv/bin/python -m tools.report',
            'cd app && ../bin/python3.11 run.py',
        ].join('\n');

        assert.deepEqual(parseShellCommands(script), [
            { type: 'http', client: 'curl', method: 'POST', path: '/analyze', line: 1 },
            { type: 'http', client: 'curl', method: 'DELETE', path: '/jobs/7', line: 2 },
            { type: 'python', form: 'script', target: 'tools/report.py', line: 3 },
            { type: 'python', form: 'module', target: 'tools.report', line: 4 },
            { type: 'python', form: 'script', target: 'run.py', line: 5 },
        ]);
    });

    test('does not mistake tools whose names contain a command word', () => {
        assert.deepEqual(parseShellCommands('python_lint src/\ncurlie get example.test/x\n'), []);
    });

    test('splits HTTP raw calls', () => {
        assert.deepEqual(parseHttpCall('HTTP:POST:/a:b'), { method: 'POST', path: '/a:b' });
        assert.equal(parseHttpCall('PYTHON:tools.report'), null);
    });
});

describe('ShellAnalyzer', () => {
    let root: string;
    let analyzer: ShellAnalyzer;

    before(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'callscope-shell-'));
        fs.mkdirSync(path.join(root, 'scripts'));
        fs.writeFileSync(path.join(root, 'scripts', 'analyze.sh'), ANALYZE_SCRIPT);
        fs.writeFileSync(path.join(root, 'deploy.bash'), 'echo "no requests here"\n');
        analyzer = new ShellAnalyzer(root);
    });

    after(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    test('produces one entry-point symbol per script', async () => {
        const table = await analyzer.buildSymbolTable(path.join(root, 'scripts', 'analyze.sh'));

        assert.equal(table.size, 1);
        const script = table.getSymbol('scripts.analyze');
        assert.ok(script);
        assert.equal(script.name, 'analyze.sh');
        assert.equal(script.language, 'shell');
        assert.equal(script.filePath, 'scripts/analyze.sh');
        assert.equal(script.lineNumber, 1);
        assert.equal(script.isEntryPoint, true);
        assert.deepEqual(script.rawCalls, [
            'HTTP:POST:/analyze',
            'HTTP:PUT:/jobs/7',
            'HTTP:GET:/status',
            'PYTHON:tools.report',
            'PYTHON:jobs/nightly.py',
        ]);
        assert.deepEqual(script.metadata, {
            kind: 'shell',
            commands: [
                { type: 'http', client: 'curl', method: 'POST', path: '/analyze' },
                { type: 'http', client: 'wget', method: 'PUT', path: '/jobs/7' },
                { type: 'http', client: 'curl', method: 'GET', path: '/status' },
                { type: 'python', form: 'module', target: 'tools.report' },
                { type: 'python', form: 'script', target: 'jobs/nightly.py' },
            ],
        });
    });

    test('merges tables and leaves resolved calls alone', async () => {
        const tables = await Promise.all([
            analyzer.buildSymbolTable(path.join(root, 'deploy.bash')),
            analyzer.buildSymbolTable(path.join(root, 'scripts', 'analyze.sh')),
        ]);
        const merged = analyzer.mergeSymbolTables(tables);
        const deploy = merged.getSymbol('deploy');
        assert.ok(deploy);
        deploy.resolvedCalls.push('ops.deploy.main');

        analyzer.resolveCalls(merged);

        assert.deepEqual(merged.getAllSymbols().map(s => s.qualifiedName), ['deploy', 'scripts.analyze']);
        assert.deepEqual(deploy.resolvedCalls, ['ops.deploy.main']);
    });

    test('records a read warning for a missing file', async () => {
        const table = await analyzer.buildSymbolTable(path.join(root, 'scripts', 'missing.sh'));

        assert.equal(table.size, 0);
        const warnings = analyzer.takeWarnings();
        assert.equal(warnings.length, 1);
        assert.equal(warnings[0].kind, 'read');
        assert.equal(warnings[0].source, 'scripts/missing.sh');
        assert.ok(warnings[0].message.startsWith('ENOENT'));
        assert.deepEqual(analyzer.takeWarnings(), []);
    });
});
