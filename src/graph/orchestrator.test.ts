import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import type { LanguageBridge } from '../bridges/types';
import { parseConfig } from '../common/config';
import { getLogLevel, setLogLevel } from '../common/logger';
import { analyze } from '../index';
import { PythonAnalyzer } from '../parser/python/adapter';
import type { SymbolTables } from '../parser/symbol-table';
import { AnalysisOrchestrator, flattenSymbolTables, getEntryPoints } from './orchestrator';
import type { EntryPointCandidate } from './types';

const config = parseConfig({ excludedDirs: ['vendor'] });

function writeFiles(root: string, files: Record<string, string[]>): void {
    for (const [relativePath, lines] of Object.entries(files)) {
        const fullPath = path.join(root, relativePath);
        fs.mkdirSync(path.dirname(fullPath), { recursive: true });
        fs.writeFileSync(fullPath, lines.join('\n'));
    }
}

function namesOf(tables: SymbolTables, language: string): string[] {
    return tables.get(language)?.getAllSymbols().map(s => s.qualifiedName) ?? [];
}

describe('AnalysisOrchestrator', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'callscope-orchestrator-'));
        writeFiles(root, {
            'api.py': [
                'from service import process',
                '',
                '',
                '@app.post("/analyze")',
                'def analyze():',
                '    return process()',
            ],
            'service.py': [
                'def process():',
                '    return _clean()',
                '',
                '',
                'def _clean():',
                '    pass',
            ],
            'scripts/analyze.sh': [
                '#!/bin/bash',
                'curl -X POST http://localhost:8000/analyze',
            ],
            '.cache/hidden.py': ['def main():', '    pass'],
            'vendor/lib.py': ['def main():', '    pass'],
            'notes.txt': ['not code'],
        });
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    test('discovers supported files outside hidden and excluded directories', async () => {
        const orchestrator = new AnalysisOrchestrator(root, { config });
        const files = await orchestrator.discoverFiles();

        assert.deepEqual(files.map(f => path.relative(root, f).split(path.sep).join('/')), [
            'api.py',
            'scripts/analyze.sh',
            'service.py',
        ]);
    });

    test('builds, resolves and bridges tables across languages', async () => {
        const tables = await analyze(root, { config });

        assert.deepEqual([...tables.keys()], ['python', 'shell']);
        assert.deepEqual(namesOf(tables, 'python'), ['api.analyze', 'service.process', 'service._clean']);
        assert.deepEqual(namesOf(tables, 'shell'), ['scripts.analyze']);

        const universe = flattenSymbolTables(tables);
        assert.deepEqual(universe.get('api.analyze')?.resolvedCalls, ['service.process']);
        assert.deepEqual(universe.get('service.process')?.resolvedCalls, ['service._clean']);
        assert.deepEqual(universe.get('scripts.analyze')?.resolvedCalls, ['api.analyze']);

        assert.deepEqual(getEntryPoints(tables).map(s => s.qualifiedName), ['api.analyze', 'scripts.analyze']);
    });

    test('records unparsable files as warnings and keeps going', async () => {
        writeFiles(root, { 'broken.py': ['def ok():', '    return 1', '', ')))', ''] });
        const orchestrator = new AnalysisOrchestrator(root, { config });

        const tables = await orchestrator.analyze();

        assert.deepEqual(namesOf(tables, 'python'), ['api.analyze', 'service.process', 'service._clean']);
        const warnings = orchestrator.getWarnings();
        assert.equal(warnings.length, 1);
        assert.equal(warnings[0].kind, 'parse');
        assert.equal(warnings[0].source, 'broken.py');
        assert.ok(warnings[0].message.startsWith('Syntax error in broken.py at line '));
    });

    test('lets later files win a module collision, whatever the merge input order', async () => {
        writeFiles(root, {
            'pkg.py': ['def load():', '    return 1'],
            'pkg/__init__.py': ['def load():', '    return 2'],
        });

        const tables = await analyze(root, { config });
        assert.equal(flattenSymbolTables(tables).get('pkg.load')?.filePath, 'pkg/__init__.py');

        const analyzer = new PythonAnalyzer(root);
        const perFile = await Promise.all([
            analyzer.buildSymbolTable(path.join(root, 'pkg', '__init__.py')),
            analyzer.buildSymbolTable(path.join(root, 'pkg.py')),
        ]);
        const forward = analyzer.mergeSymbolTables(perFile).getAllSymbols().map(s => s.qualifiedName);
        const reversed = analyzer.mergeSymbolTables([...perFile].reverse()).getAllSymbols().map(s => s.qualifiedName);
        assert.deepEqual(forward, ['pkg.load']);
        assert.deepEqual(reversed, forward);
    });

    test('unmarks entry points the filter rejects and offers it call counts', async () => {
        const offered: EntryPointCandidate[] = [];
        const tables = await analyze(root, {
            config,
            entryPointFilter: {
                filter: async (candidates) => {
                    offered.push(...candidates);
                    return [];
                },
            },
        });

        assert.deepEqual(offered, [{
            qualifiedName: 'api.analyze',
            name: 'analyze',
            language: 'python',
            filePath: 'api.py',
            documentation: null,
            usesCliParsing: false,
            calledInMainGuard: false,
            isTest: false,
            isPrivate: false,
            callerCount: 0,
            calleeCount: 1,
        }]);
        // Shell scripts are never offered and always stay entry points
        assert.deepEqual(getEntryPoints(tables).map(s => s.qualifiedName), ['scripts.analyze']);
    });

    test('keeps every candidate when the filter fails', async () => {
        const tables = await analyze(root, {
            config,
            entryPointFilter: {
                filter: async () => {
                    throw new Error('ranking service unavailable');
                },
            },
        });

        assert.deepEqual(getEntryPoints(tables).map(s => s.qualifiedName), ['api.analyze', 'scripts.analyze']);
    });

    test('reports a failing bridge without aborting the run', async () => {
        const failing: LanguageBridge = {
            name: 'BrokenBridge',
            canBridge: () => true,
            resolve: () => {
                throw new Error('boom');
            },
        };
        const orchestrator = new AnalysisOrchestrator(root, { config, bridges: [failing] });

        const tables = await orchestrator.analyze();

        assert.deepEqual(flattenSymbolTables(tables).get('scripts.analyze')?.resolvedCalls, []);
        assert.deepEqual(orchestrator.getWarnings(), [{ kind: 'bridge', source: 'BrokenBridge', message: 'boom' }]);
    });

    test('applies the configured log level before analyzing', async () => {
        const previous = getLogLevel();
        setLogLevel('debug');
        try {
            await analyze(root, { config: parseConfig({ excludedDirs: ['vendor'], logLevel: 'error' }) });
            assert.equal(getLogLevel(), 'error');
        } finally {
            setLogLevel(previous);
        }
    });

    test('uses the analyzers it is given', async () => {
        const orchestrator = new AnalysisOrchestrator(root, {
            config,
            analyzers: projectRoot => [new PythonAnalyzer(projectRoot)],
        });

        const tables = await orchestrator.analyze();

        assert.deepEqual([...tables.keys()], ['python']);
        assert.deepEqual(orchestrator.registry.getSupportedExtensions(), ['.py']);
    });
});
