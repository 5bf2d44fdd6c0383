/**
 * Python Analyzer Module
 *
 * Tree-sitter based extraction, per-module import tracking and call
 * resolution with lightweight receiver type inference.
 */

export { PythonAnalyzer } from './adapter';
export { PythonExtractor, PythonSyntaxError, moduleNameFor, cleanDocstring } from './extractor';
export type { PythonFileExtraction } from './extractor';
export { PythonImportParser } from './imports';
export type { ImportBinding, ModuleContext } from './imports';
export { PythonCallResolver, resolvePythonCalls } from './resolver';
export { PythonSymbolTable } from './symbol-table';
export type { ClassInfo } from './symbol-table';
export { isPythonEntryPoint, markPythonEntryPoints, isTestFile, isTestName, isPrivateName } from './entry-points';
