import { Connection, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { TokenCache } from '../../analysis/project/cache';
import { JbplSettings } from '../../util/config';
import { computeDiagnostics } from '../diagnostics';
import { isJbplDocument } from '../semanticTokens';

export const DEBOUNCE_MS = 300;

export function registerDocuments(
    conn: Connection,
    docs: TextDocuments<TextDocument>,
    cache: TokenCache,
    settings: () => JbplSettings
): () => void {
    const validate = (doc: TextDocument) => {
        if (!isJbplDocument(doc)) return;
        try {
            const diagnostics = computeDiagnostics(doc, cache.get(doc), settings());
            conn.sendDiagnostics({ uri: doc.uri, diagnostics });
        } catch (err) {
            console.warn(`Failed to validate ${doc.uri} – ${String(err)}`);
        }
    };

    // Debounce timers per-URI so each file gets its own delay
    const debounceTimers = new Map<string, ReturnType<typeof setTimeout>>();

    const cancelPending = (uri: string) => {
        const pending = debounceTimers.get(uri);
        if (pending) {
            clearTimeout(pending);
            debounceTimers.delete(uri);
        }
    };

    docs.onDidOpen(change => validate(change.document));
    docs.onDidSave(change => {
        cancelPending(change.document.uri);
        validate(change.document);
    });
    docs.onDidChangeContent(change => {
        const uri = change.document.uri;
        cancelPending(uri);
        debounceTimers.set(uri, setTimeout(() => {
            debounceTimers.delete(uri);
            // Re-fetch the latest document — the user may have typed more
            const latestDoc = docs.get(uri);
            if (latestDoc) validate(latestDoc);
        }, DEBOUNCE_MS));
    });

    docs.onDidClose(change => {
        const uri = change.document.uri;
        cancelPending(uri);
        cache.delete(uri);
        conn.sendDiagnostics({ uri, diagnostics: [] });
    });

    // Re-validate every open document, e.g. after a settings change
    return () => {
        for (const doc of docs.all()) validate(doc);
    };
}
