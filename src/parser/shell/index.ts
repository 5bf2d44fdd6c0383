/**
 * Shell Analyzer Module
 */

export { ShellAnalyzer, ShellSymbolTable } from './adapter';
export {
    parseShellCommands,
    logicalLines,
    extractRequestPath,
    formatRawCall,
    parseHttpCall,
    HTTP_CALL_PREFIX,
    PYTHON_CALL_PREFIX,
} from './commands';
export type { LogicalLine } from './commands';
