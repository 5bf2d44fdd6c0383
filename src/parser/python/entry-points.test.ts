import { strict as assert } from 'assert';
import { describe, test } from 'node:test';
import { createSymbol, pythonMetadata } from '../types';
import type { CodeSymbol, PythonMetadata } from '../types';
import { isPythonEntryPoint, isTestFile, markPythonEntryPoints } from './entry-points';
import { PythonSymbolTable } from './symbol-table';

function pythonSymbol(
    name: string,
    filePath = 'lib/jobs.py',
    overrides: Partial<Omit<PythonMetadata, 'kind' | 'module'>> = {}
): CodeSymbol {
    const module = filePath.replace(/\.py$/, '').split('/').join('.');
    return createSymbol({
        name,
        qualifiedName: `${module}.${name}`,
        language: 'python',
        filePath,
        lineNumber: 1,
        metadata: pythonMetadata(module, overrides),
    });
}

describe('isPythonEntryPoint', () => {
    test('never accepts private or dunder names', () => {
        assert.equal(isPythonEntryPoint(pythonSymbol('_sync', 'lib/jobs.py', { http: { method: 'GET', route: '/sync' } })), false);
        assert.equal(isPythonEntryPoint(pythonSymbol('__init__', 'lib/jobs.py', { calledInMainGuard: true })), false);
    });

    test('accepts HTTP handlers, main-guard calls and CLI parsers', () => {
        assert.equal(isPythonEntryPoint(pythonSymbol('sync', 'lib/jobs.py', { http: { method: 'POST', route: '/sync' } })), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('rebuild', 'lib/jobs.py', { calledInMainGuard: true })), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('parse', 'lib/jobs.py', { usesCliParsing: true })), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('<script:serve>', 'lib/serve.py', { isScript: true })), true);
    });

    test('accepts tests by name or by file', () => {
        assert.equal(isPythonEntryPoint(pythonSymbol('test_rebuild')), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('setUp')), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('compute', 'tests/test_math.py')), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('compute', 'lib/math.py')), false);
    });

    test('accepts conventional runner names only when they match exactly', () => {
        assert.equal(isPythonEntryPoint(pythonSymbol('main')), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('initialize')), true);
        assert.equal(isPythonEntryPoint(pythonSymbol('runner')), false);
        assert.equal(isPythonEntryPoint(pythonSymbol('main_loop')), false);
    });

    test('ignores shell symbols', () => {
        const script = createSymbol({
            name: 'deploy.sh',
            qualifiedName: 'deploy',
            language: 'shell',
            filePath: 'deploy.sh',
            lineNumber: 1,
            metadata: { kind: 'shell', commands: [] },
        });
        assert.equal(isPythonEntryPoint(script), false);
    });
});

describe('isTestFile', () => {
    test('matches pytest file naming', () => {
        assert.equal(isTestFile('tests/test_api.py'), true);
        assert.equal(isTestFile('pkg/api_test.py'), true);
        assert.equal(isTestFile('conftest.py'), true);
        assert.equal(isTestFile('pkg/testing.py'), false);
        assert.equal(isTestFile('pkg/contest.py'), false);
    });
});

describe('markPythonEntryPoints', () => {
    test('recomputes the flag for every symbol', () => {
        const table = new PythonSymbolTable();
        const main = pythonSymbol('main');
        const helper = pythonSymbol('helper');
        helper.isEntryPoint = true;
        table.addSymbol(main);
        table.addSymbol(helper);

        markPythonEntryPoints(table);

        assert.equal(main.isEntryPoint, true);
        assert.equal(helper.isEntryPoint, false);
    });
});
