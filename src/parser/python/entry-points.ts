/**
 * Python entry-point heuristics.
 */

import * as path from 'path';
import { ENTRY_POINT_NAMES, TEST_HOOK_NAMES } from '../config';
import type { CodeSymbol } from '../types';
import type { SymbolTable } from '../symbol-table';

export function isPrivateName(name: string): boolean {
    return name.startsWith('_');
}

export function isTestName(name: string): boolean {
    return name.startsWith('test_') || TEST_HOOK_NAMES.has(name);
}

/**
 * test_*.py, *_test.py and conftest.py
 */
export function isTestFile(filePath: string): boolean {
    const base = path.posix.basename(filePath.split(path.sep).join('/'));
    return (base.startsWith('test_') && base.endsWith('.py'))
        || base.endsWith('_test.py')
        || base === 'conftest.py';
}

export function isPythonEntryPoint(symbol: CodeSymbol): boolean {
    const metadata = symbol.metadata;
    if (metadata.kind !== 'python') return false;
    if (isPrivateName(symbol.name)) return false;

    return metadata.isScript
        || metadata.http !== null
        || isTestName(symbol.name)
        || isTestFile(symbol.filePath)
        || metadata.calledInMainGuard
        || metadata.usesCliParsing
        || ENTRY_POINT_NAMES.has(symbol.name);
}

export function markPythonEntryPoints(table: SymbolTable): void {
    for (const symbol of table.getAllSymbols()) {
        symbol.isEntryPoint = isPythonEntryPoint(symbol);
    }
}
