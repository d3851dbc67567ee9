/**
 * Rules Module - JBPL Lexer Pattern Library
 * =========================================
 *
 * Keyword sets, instruction mnemonics, and literal grammars for JBPL
 * (Java Bytecode Patch Language). Everything here is plain data, built once
 * at module load and never modified.
 *
 * CLASSIFICATION PRIORITY (first match wins):
 *   special keywords > keywords > prepro type keywords > type keywords
 *   > constant keywords > instruction mnemonics > plain identifier
 *
 * An identifier can match several sets at once, so the lexer tries the
 * recognizers in exactly this order. Keyword and mnemonic recognizers are
 * bounded by `\b` on both sides: `if$x` yields the keyword `if`, while
 * `if_x` stays a name.
 *
 * @module jbpl/server/src/analysis/lexer/rules
 */

export const keywords: readonly string[] = [
  // Compile-time operators
  'typeof', 'opcodeof', 'sizeof',
  // Declarations
  'yeet', 'inject', 'field', 'fun', 'class', 'macro',
  // Modifiers
  'public', 'protected', 'private', 'static', 'sync', 'final', 'transient', 'volatile',
  // Preprocessor
  'info', 'error', 'assert', 'version', 'define', 'include',
  // Control flow
  'if', 'else', 'when', 'for', 'break', 'continue', 'default',
  'this', 'is', 'as', 'in', 'by'
];

// Keywords that also introduce a type name ('type Foo')
export const preproTypeKeywords: readonly string[] = ['type', 'opcode', 'instruction', 'signature'];

export const intTypes: readonly string[] = ['i8', 'i16', 'i32', 'i64'];
export const floatTypes: readonly string[] = ['f32', 'f64'];

export const typeKeywords: readonly string[] = ['void', 'char', 'bool', 'string', ...intTypes, ...floatTypes];
export const constantKeywords: readonly string[] = ['true', 'false'];
export const specialKeywords: readonly string[] = ['^return', '^class'];

/**
 * Instruction mnemonic grammars, one per category.
 * Entries are regular expression sources, joined into a single alternation.
 */
export const instructionCategories = {
  constant: 'ldc|([bs]ipush)|(iconst_(m1|[012345]))|(lconst_[01])|(fconst_[012])|(dconst_[01])|aconst_null',
  stack: '[ilfda](load|store)|(dup(2)?(_x[12])?)|(pop(2)?)',
  field: '(get(field|static))|(put(field|static))',
  jump: 'goto|jsr|ret',
  conversion: '(i2[bcdfls])|(f2[dil])|(d2[fil])|(l2[dfi])',
  logic: '([il](ushr|shl|shr|and|xor|or))',
  arithmetic: '([ilfd](add|sub|mul|div|rem|neg))',
  array: 'multianewarray|arraylength|anewarray|([ilfdacsz]newarray)|([ilfda]aload)|([ilfda]astore)',
  misc: '(monitor(enter|exit))|athrow|iinc|nop',
  control: '((lookup|table)switch)|([ilfda]?return)',
  typeCheck: 'checkcast|instanceof|new',
  conditional: '(if_acmp(eq|ne))|(if(_icmp)?(eq|ne|lt|ge|gt|le))',
  invocation: '(invoke(interface|virtual|static|special|dynamic))'
} as const;

export type InstructionCategory = keyof typeof instructionCategories;

// Alternation order of the combined recognizer
export const instructionOrder: readonly InstructionCategory[] = [
  'constant', 'stack', 'field', 'jump', 'conversion', 'typeCheck', 'conditional',
  'logic', 'arithmetic', 'invocation', 'array', 'misc', 'control'
];

export const instruction = `(${instructionOrder.map(c => instructionCategories[c]).join('|')})`;

export const name = '[a-zA-Z_][a-zA-Z0-9_$]*';
export const punctuation = '[$~!%^&*()+=|\\[\\]:,.<>/?-]';
export const whitespace = '[^\\S\\n]+';

// One leading character, then the tail: adjacent overlapping quantifiers
// would backtrack quadratically when a rule fails after the run
const digits = '[0-9][0-9_]*';
const exponent = `[eE]${digits}`;

export const decLiteral = digits;
export const binLiteral = '0[bB][01][01_]*';
export const hexLiteral = '0[xX][0-9a-fA-F][0-9a-fA-F_]*';
export const octLiteral = '0[oO][0-7][0-7_]*';
// Fraction or exponent required; a bare digit run is an integer
export const floatLiteral = `${digits}(?:\\.${digits}(?:${exponent})?|${exponent})`;

export const intSuffix = `(?:${intTypes.join('|')})`;
export const floatSuffix = `(?:${floatTypes.join('|')})`;

export const classTypeName = `<${name}(?:/${name})*?>`;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/** `\b(?:a|b|c)\b` over a word list */
export function wordAlternation(words: readonly string[]): string {
  return `\\b(?:${words.map(escapeRegExp).join('|')})\\b`;
}
