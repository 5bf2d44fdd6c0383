/**
 * Analyzer Registry
 *
 * Maps file extensions to language analyzers. One registry is built per
 * project root, since analyzers carry the root they compute module names
 * against.
 */

import * as path from 'path';
import { createLogger } from '../common/logger';
import type { LanguageAnalyzer } from './adapter';

const log = createLogger('registry');

export class AnalyzerRegistry {
    /** Map of language ID → analyzer */
    private analyzers = new Map<string, LanguageAnalyzer>();

    /** Map of file extension (lowercase) → analyzer */
    private extensionMap = new Map<string, LanguageAnalyzer>();

    constructor(analyzers: LanguageAnalyzer[] = []) {
        for (const analyzer of analyzers) {
            this.register(analyzer);
        }
    }

    /**
     * Register a language analyzer
     *
     * @throws Error if the language ID or one of its extensions is already registered
     */
    public register(analyzer: LanguageAnalyzer): void {
        if (this.analyzers.has(analyzer.id)) {
            throw new Error(`Language analyzer already registered: ${analyzer.id}`);
        }

        const extensions = analyzer.extensions.map(ext => ext.toLowerCase());
        for (const ext of extensions) {
            const existing = this.extensionMap.get(ext);
            if (existing) {
                throw new Error(
                    `Extension ${ext} already registered by ${existing.id}, ` +
                    `cannot register for ${analyzer.id}`
                );
            }
        }

        this.analyzers.set(analyzer.id, analyzer);
        for (const ext of extensions) {
            this.extensionMap.set(ext, analyzer);
        }

        log.debug(`Registered ${analyzer.displayName}`, { id: analyzer.id, extensions: extensions.join(', ') });
    }

    /**
     * Analyzer for a file, or null if its type is not supported
     */
    public getAnalyzer(filePath: string): LanguageAnalyzer | null {
        return this.extensionMap.get(path.extname(filePath).toLowerCase()) ?? null;
    }

    public getAnalyzerById(languageId: string): LanguageAnalyzer | undefined {
        return this.analyzers.get(languageId);
    }

    public isSupported(filePath: string): boolean {
        return this.extensionMap.has(path.extname(filePath).toLowerCase());
    }

    /**
     * All analyzers, in registration order
     */
    public getAllAnalyzers(): LanguageAnalyzer[] {
        return Array.from(this.analyzers.values());
    }

    /**
     * @returns File extensions (lowercase, with dot)
     */
    public getSupportedExtensions(): string[] {
        return Array.from(this.extensionMap.keys());
    }
}
