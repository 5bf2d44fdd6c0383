/**
 * Shell Language Analyzer
 *
 * One symbol per script. Its raw calls are the HTTP requests and Python
 * invocations found in the script; they are left for the bridges to
 * resolve, since shell has no intra-language calls worth following.
 */

import * as path from 'path';
import { createLogger } from '../../common/logger';
import { BaseAnalyzer } from '../adapter';
import { SHELL_EXTENSIONS } from '../config';
import { SymbolTable } from '../symbol-table';
import { createSymbol } from '../types';
import type { ShellCommand, ShellCommandInfo } from '../types';
import { formatRawCall, parseShellCommands } from './commands';

const log = createLogger('shell');

export class ShellSymbolTable extends SymbolTable {
    constructor() {
        super('shell');
    }
}

function withoutLine(command: ShellCommand): ShellCommandInfo {
    return command.type === 'http'
        ? { type: 'http', client: command.client, method: command.method, path: command.path }
        : { type: 'python', form: command.form, target: command.target };
}

export class ShellAnalyzer extends BaseAnalyzer {
    readonly id = 'shell';
    readonly displayName = 'Shell';
    readonly extensions = SHELL_EXTENSIONS;

    async buildSymbolTable(filePath: string): Promise<ShellSymbolTable> {
        const table = new ShellSymbolTable();
        const relativePath = this.relativePath(filePath);

        const content = await this.readSource(filePath);
        if (content === null) return table;

        const commands = parseShellCommands(content).map(withoutLine);
        table.addSymbol(createSymbol({
            name: path.posix.basename(relativePath),
            qualifiedName: this.dottedName(relativePath),
            language: 'shell',
            filePath: relativePath,
            lineNumber: 1,
            metadata: { kind: 'shell', commands },
            rawCalls: commands.map(formatRawCall),
            isEntryPoint: true,
        }));

        log.debug('Extracted script', { file: relativePath, commands: commands.length });
        return table;
    }

    mergeSymbolTables(tables: SymbolTable[]): ShellSymbolTable {
        const merged = new ShellSymbolTable();
        for (const table of tables) {
            if (!(table instanceof ShellSymbolTable)) continue;
            for (const symbol of table.getAllSymbols()) {
                merged.addSymbol(symbol);
            }
        }
        return merged;
    }

    /**
     * No intra-language resolution; cross-language bridges fill
     * resolvedCalls later.
     */
    resolveCalls(_table: SymbolTable): void {
        // nothing to resolve
    }

    markEntryPoints(table: SymbolTable): void {
        for (const symbol of table.getAllSymbols()) {
            symbol.isEntryPoint = true;
        }
    }
}
