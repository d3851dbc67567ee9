import { Connection, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { TokenCache } from '../analysis/project/cache';
import { JbplSettings } from '../util/config';
import { registerDocuments } from './handlers/documents';
import { registerSemanticTokens } from './handlers/semanticTokens';

/**
 * Wires every feature handler. Returns a callback that re-validates all
 * open documents.
 */
export function registerAllHandlers(
    conn: Connection,
    docs: TextDocuments<TextDocument>,
    cache: TokenCache,
    settings: () => JbplSettings
): () => void {
    registerSemanticTokens(conn, docs, cache);
    return registerDocuments(conn, docs, cache, settings);
}
