import { Connection, SemanticTokens, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { mergeTokens } from '../../analysis/lexer/lexer';
import { TokenCache } from '../../analysis/project/cache';
import { buildSemanticTokens, isJbplDocument } from '../semanticTokens';

export function registerSemanticTokens(
    conn: Connection,
    docs: TextDocuments<TextDocument>,
    cache: TokenCache
): void {
    conn.languages.semanticTokens.on((params): SemanticTokens => {
        const doc = docs.get(params.textDocument.uri);
        if (!doc || !isJbplDocument(doc)) return { data: [] };

        try {
            return buildSemanticTokens(doc, mergeTokens(cache.get(doc).tokens));
        } catch (err) {
            console.warn(`Failed to compute semantic tokens for ${doc.uri} – ${String(err)}`);
            return { data: [] };
        }
    });
}
