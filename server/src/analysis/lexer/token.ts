/**
 * Token Module - JBPL Language Server
 * ===================================
 *
 * Defines the token kinds produced by the lexer. Tokens are consumed by
 * the highlighting layer (semantic tokens) and by diagnostics.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → [semanticTokens.ts] → LSP client
 *
 * Kinds are dotted paths: a consumer that does not know a sub-kind can
 * fall back to its parent (e.g. 'Name.Variable.Instance' → 'Name.Variable').
 *
 * @module jbpl/server/src/analysis/lexer/token
 */

/**
 * Token kinds for the JBPL lexer (closed set)
 */
export enum TokenKind {
  Keyword = 'Keyword',
  KeywordType = 'Keyword.Type',
  KeywordConstant = 'Keyword.Constant',

  /** Bytecode instruction mnemonic */
  OperatorWord = 'Operator.Word',

  NameClass = 'Name.Class',
  NameFunction = 'Name.Function',
  NameVariable = 'Name.Variable',
  NameVariableInstance = 'Name.Variable.Instance',

  StringDouble = 'Literal.String.Double',
  StringInterpol = 'Literal.String.Interpol',
  StringChar = 'Literal.String.Char',

  NumberBin = 'Literal.Number.Bin',
  NumberHex = 'Literal.Number.Hex',
  NumberOct = 'Literal.Number.Oct',
  NumberFloat = 'Literal.Number.Float',
  NumberInteger = 'Literal.Number.Integer',

  CommentSingle = 'Comment.Single',
  CommentMultiline = 'Comment.Multiline',

  Punctuation = 'Punctuation',
  Text = 'Text',

  /** Fallback for a single unrecognized character */
  Unclassified = 'Error'
}

/**
 * Token interface - represents a single lexical token
 *
 * @property value - The exact lexeme
 * @property start - Offset where the token starts in source
 * @property end - Offset just past the token
 */
export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

/**
 * Expands a kind into its hierarchy, most general first.
 */
export function tokenKindParts(kind: TokenKind): string[] {
  const segments = kind.split('.');
  return segments.map((_, i) => segments.slice(0, i + 1).join('.'));
}
