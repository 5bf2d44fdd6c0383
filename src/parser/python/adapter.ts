/**
 * Python Language Analyzer
 *
 * Integrates the tree-sitter Python extractor with the analysis pipeline.
 */

import { createLogger } from '../../common/logger';
import { BaseAnalyzer } from '../adapter';
import { PYTHON_EXTENSIONS } from '../config';
import type { SymbolTable } from '../symbol-table';
import { markPythonEntryPoints } from './entry-points';
import { PythonExtractor } from './extractor';
import { resolvePythonCalls } from './resolver';
import { PythonSymbolTable } from './symbol-table';

const log = createLogger('python');

export class PythonAnalyzer extends BaseAnalyzer {
    readonly id = 'python';
    readonly displayName = 'Python';
    readonly extensions = PYTHON_EXTENSIONS;

    private extractor: PythonExtractor | null = null;

    async buildSymbolTable(filePath: string): Promise<PythonSymbolTable> {
        const table = new PythonSymbolTable();
        const relativePath = this.relativePath(filePath);

        const source = await this.readSource(filePath);
        if (source === null) return table;

        try {
            this.extractor ??= new PythonExtractor();
            const extraction = this.extractor.extract(source, relativePath);

            for (const symbol of extraction.symbols) {
                table.addSymbol(symbol);
            }
            for (const info of extraction.classes) {
                table.addClass(info);
            }
            table.setImports(extraction.module, extraction.imports);

            log.debug('Extracted file', {
                file: relativePath,
                module: extraction.module,
                symbols: extraction.symbols.length,
                classes: extraction.classes.length,
            });
        } catch (error) {
            this.recordWarning('parse', relativePath, error);
            return new PythonSymbolTable();
        }
        return table;
    }

    mergeSymbolTables(tables: SymbolTable[]): PythonSymbolTable {
        const merged = new PythonSymbolTable();
        for (const table of tables) {
            if (table instanceof PythonSymbolTable) {
                merged.absorb(table);
            }
        }
        return merged;
    }

    resolveCalls(table: SymbolTable): void {
        if (table instanceof PythonSymbolTable) {
            resolvePythonCalls(table);
        }
    }

    markEntryPoints(table: SymbolTable): void {
        markPythonEntryPoints(table);
    }
}
