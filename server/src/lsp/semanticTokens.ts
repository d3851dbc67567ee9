/**
 * Semantic Tokens - JBPL LSP
 * ==========================
 *
 * Maps lexer token kinds onto LSP semantic token types and encodes them
 * for the client.
 *
 * MAPPING:
 *   The most specific kind with an entry wins, then its parents
 *   ('Literal.String.Char' → 'Literal.String' → string).
 *   Text, Punctuation and Unclassified have no entry and are not sent;
 *   unclassified input is reported through diagnostics instead.
 *
 * LSP tokens cannot span lines, so multi-line tokens (block comments,
 * strings with newlines) are split into one token per line.
 *
 * @module jbpl/server/src/lsp/semanticTokens
 */

import { SemanticTokens, SemanticTokensBuilder, SemanticTokensLegend } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Token, TokenKind, tokenKindParts } from '../analysis/lexer/token';
import { JBPL_LANGUAGE, matchesFilename } from '../analysis/lexer/language';
import { uriBasename } from '../util/uri';

export const tokenTypes = [
    'keyword',
    'type',
    'operator',
    'class',
    'function',
    'variable',
    'property',
    'string',
    'number',
    'comment'
] as const;

export const tokenModifiers = ['defaultLibrary'] as const;

type SemanticTokenType = (typeof tokenTypes)[number];
type SemanticTokenModifier = (typeof tokenModifiers)[number];

export const legend: SemanticTokensLegend = {
    tokenTypes: [...tokenTypes],
    tokenModifiers: [...tokenModifiers]
};

interface Mapping {
    type: SemanticTokenType;
    modifiers?: SemanticTokenModifier[];
}

const kindMappings: ReadonlyMap<string, Mapping> = new Map<string, Mapping>([
    ['Keyword', { type: 'keyword' }],
    ['Keyword.Type', { type: 'type', modifiers: ['defaultLibrary'] }],
    ['Keyword.Constant', { type: 'keyword', modifiers: ['defaultLibrary'] }],
    ['Operator.Word', { type: 'operator', modifiers: ['defaultLibrary'] }],
    ['Name.Class', { type: 'class' }],
    ['Name.Function', { type: 'function' }],
    ['Name.Variable', { type: 'variable' }],
    ['Name.Variable.Instance', { type: 'property' }],
    ['Literal.String', { type: 'string' }],
    ['Literal.String.Interpol', { type: 'operator' }],
    ['Literal.Number', { type: 'number' }],
    ['Comment', { type: 'comment' }]
]);

export function mappingFor(kind: TokenKind): Mapping | undefined {
    const parts = tokenKindParts(kind);
    for (let i = parts.length - 1; i >= 0; i--) {
        const mapping = kindMappings.get(parts[i]);
        if (mapping) return mapping;
    }
    return undefined;
}

export interface SemanticToken {
    line: number;
    character: number;
    length: number;
    tokenType: number;
    tokenModifiers: number;
}

function encodeModifiers(modifiers: readonly SemanticTokenModifier[] = []): number {
    return modifiers.reduce((bits, m) => bits | (1 << tokenModifiers.indexOf(m)), 0);
}

export function isJbplDocument(doc: { uri: string; languageId: string }): boolean {
    return doc.languageId === JBPL_LANGUAGE.tag || matchesFilename(uriBasename(doc.uri));
}

/**
 * Absolute-position semantic tokens, in document order.
 */
export function collectSemanticTokens(doc: TextDocument, tokens: readonly Token[]): SemanticToken[] {
    const result: SemanticToken[] = [];

    for (const tok of tokens) {
        const mapping = mappingFor(tok.kind);
        if (!mapping) continue;

        const tokenType = tokenTypes.indexOf(mapping.type);
        const modifierBits = encodeModifiers(mapping.modifiers);

        const lineBreak = /\r\n|\r|\n/g;
        let segStart = 0;
        for (;;) {
            const br = lineBreak.exec(tok.value);
            const segEnd = br ? br.index : tok.value.length;
            if (segEnd > segStart) {
                const pos = doc.positionAt(tok.start + segStart);
                result.push({
                    line: pos.line,
                    character: pos.character,
                    length: segEnd - segStart,
                    tokenType,
                    tokenModifiers: modifierBits
                });
            }
            if (!br) break;
            segStart = br.index + br[0].length;
        }
    }

    return result;
}

export function buildSemanticTokens(doc: TextDocument, tokens: readonly Token[]): SemanticTokens {
    const builder = new SemanticTokensBuilder();
    for (const t of collectSemanticTokens(doc, tokens)) {
        builder.push(t.line, t.character, t.length, t.tokenType, t.tokenModifiers);
    }
    return builder.build();
}
