/**
 * Token Cache
 * ===========
 *
 * Keeps the last scan result per open document so that semantic token
 * requests and diagnostics for the same document version share one scan.
 *
 * Keys are normalized URIs (see util/uri.ts); an entry is valid only for
 * the document version it was produced from.
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import { LexResult, scan } from '../lexer/lexer';
import { normalizeUri } from '../../util/uri';

interface CacheEntry {
    version: number;
    result: LexResult;
}

export interface CacheStats {
    entries: number;
    hits: number;
    misses: number;
}

export class TokenCache {
    private entries = new Map<string, CacheEntry>();
    private hits = 0;
    private misses = 0;

    /**
     * Returns the scan result for the document, scanning only when the
     * cached entry is missing or stale.
     */
    get(doc: TextDocument): LexResult {
        const key = normalizeUri(doc.uri);
        const entry = this.entries.get(key);
        if (entry && entry.version === doc.version) {
            this.hits++;
            return entry.result;
        }

        this.misses++;
        const result = scan(doc.getText());
        this.entries.set(key, { version: doc.version, result });
        return result;
    }

    delete(uri: string): void {
        this.entries.delete(normalizeUri(uri));
    }

    clear(): void {
        this.entries.clear();
    }

    getStats(): CacheStats {
        return { entries: this.entries.size, hits: this.hits, misses: this.misses };
    }
}
