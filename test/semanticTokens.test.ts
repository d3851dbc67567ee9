import { TextDocument } from 'vscode-languageserver-textdocument';
import { lex } from '../server/src/analysis/lexer/lexer';
import { TokenKind } from '../server/src/analysis/lexer/token';
import {
    buildSemanticTokens,
    collectSemanticTokens,
    isJbplDocument,
    legend,
    mappingFor
} from '../server/src/lsp/semanticTokens';

const typeIndex = (type: string) => legend.tokenTypes.indexOf(type);

function doc(text: string): TextDocument {
    return TextDocument.create('file:///test.jbpl', 'jbpl', 1, text);
}

test('maps kinds through their parents', () => {
    expect(mappingFor(TokenKind.StringChar)).toEqual({ type: 'string' });
    expect(mappingFor(TokenKind.NumberHex)).toEqual({ type: 'number' });
    expect(mappingFor(TokenKind.NameVariableInstance)).toEqual({ type: 'property' });
    expect(mappingFor(TokenKind.CommentSingle)).toEqual({ type: 'comment' });
    expect(mappingFor(TokenKind.Punctuation)).toBeUndefined();
    expect(mappingFor(TokenKind.Text)).toBeUndefined();
    expect(mappingFor(TokenKind.Unclassified)).toBeUndefined();
});

test('collects absolute tokens and skips text', () => {
    const d = doc('nop // hi\n"s"');
    expect(collectSemanticTokens(d, lex(d.getText(), { merge: true }))).toEqual([
        { line: 0, character: 0, length: 3, tokenType: typeIndex('operator'), tokenModifiers: 1 },
        { line: 0, character: 4, length: 5, tokenType: typeIndex('comment'), tokenModifiers: 0 },
        { line: 1, character: 0, length: 3, tokenType: typeIndex('string'), tokenModifiers: 0 },
    ]);
});

test('splits multi-line tokens per line', () => {
    const d = doc('/* a\r\nb */');
    expect(collectSemanticTokens(d, lex(d.getText(), { merge: true }))).toEqual([
        { line: 0, character: 0, length: 4, tokenType: typeIndex('comment'), tokenModifiers: 0 },
        { line: 1, character: 0, length: 4, tokenType: typeIndex('comment'), tokenModifiers: 0 },
    ]);
});

test('encodes relative positions', () => {
    const d = doc('nop // hi\n"s"');
    const operator = typeIndex('operator');
    const comment = typeIndex('comment');
    const string = typeIndex('string');
    expect(buildSemanticTokens(d, lex(d.getText(), { merge: true })).data).toEqual([
        0, 0, 3, operator, 1,
        0, 4, 5, comment, 0,
        1, 0, 3, string, 0,
    ]);
});

test('recognizes JBPL documents by language id or file name', () => {
    expect(isJbplDocument({ uri: 'untitled:Untitled-1', languageId: 'jbpl' })).toBe(true);
    expect(isJbplDocument({ uri: 'file:///work/patch.jbpl', languageId: 'plaintext' })).toBe(true);
    expect(isJbplDocument({ uri: 'file:///work/patch.txt', languageId: 'plaintext' })).toBe(false);
});
