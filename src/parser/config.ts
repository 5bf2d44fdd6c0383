/**
 * Parser Configuration
 *
 * Name patterns and heuristics shared by the language analyzers.
 */

// ============================================================================
// Supported Extensions
// ============================================================================

export const PYTHON_EXTENSIONS = ['.py'] as const;

export const SHELL_EXTENSIONS = ['.sh', '.bash'] as const;

// ============================================================================
// Python Entry Points
// ============================================================================

/**
 * Function names that are entry points wherever they are defined
 */
export const ENTRY_POINT_NAMES: ReadonlySet<string> = new Set([
    'main',
    'run',
    'execute',
    'start',
    'init',
    'initialize',
]);

/**
 * unittest / pytest lifecycle hooks
 */
export const TEST_HOOK_NAMES: ReadonlySet<string> = new Set([
    'setUp',
    'tearDown',
    'setUpClass',
    'tearDownClass',
    'setup_method',
    'teardown_method',
    'setup_class',
    'teardown_class',
]);

/**
 * Decorator names that mark click/typer style command handlers
 */
export const CLI_DECORATOR_NAMES: ReadonlySet<string> = new Set(['command', 'group', 'option', 'argument']);

/**
 * Call-name fragments that indicate argparse style parsing
 */
export const CLI_CALL_FRAGMENTS = ['ArgumentParser', 'parse_args', 'add_argument'] as const;

/**
 * Source fragments of a server being started from a `__main__` guard
 */
export const SERVER_START_PATTERNS = [
    'uvicorn.run',
    'app.run(',
    'flask.run(',
    'gunicorn',
    'waitress.serve',
    'web.run_app',
] as const;

/**
 * Path fragments (lowercase, matched against "/" + relative path) of files
 * that never produce a synthetic script symbol
 */
export const NON_SCRIPT_PATH_PATTERNS = [
    '/tests/',
    '/test/',
    '/test_',
    '_test.py',
    '/examples/',
    '/example_',
    '/debug/',
    '/conftest.py',
] as const;

/**
 * Decorator attributes that register an HTTP handler (`@app.get("/p")`)
 */
export const HTTP_DECORATOR_METHODS: ReadonlySet<string> = new Set(['get', 'post', 'put', 'delete', 'patch']);

export const SCRIPT_SYMBOL_PREFIX = '<script:';

// ============================================================================
// Parsing
// ============================================================================

/**
 * Characters handed to tree-sitter per input callback
 */
export const PARSE_CHUNK_SIZE = 16 * 1024;
