/**
 * States Module - JBPL Lexer State Tables
 * =======================================
 *
 * Each lexical state is an ordered rule list. The lexer tries the rules of
 * the state on top of its stack from top to bottom and the FIRST match wins,
 * so the order below matters: reordering two rules changes the output.
 *
 * A state may mix in another state's rules at a fixed position. Mixins are
 * flattened once, when this module loads; the lexer never recurses.
 *
 * STATE MAP:
 *   root ─┬─ "  ──► string ── ${ ──► string_lerp (body rules, } pops)
 *         ├─ (  ──► body   (nested parens keep the stack symmetrical)
 *         ├─ ${ ──► lerp   (body rules, } pops)
 *         ├─ fun/inject ──► function      field ──► field
 *         ├─ macro ──► macro              define ──► define
 *         ├─ by ──► selection             ^class ──► prepro_class
 *         ├─ >.name( ──► macro_call
 *         └─ /* (unclosed) ──► comment (nests)
 *
 * @module jbpl/server/src/analysis/lexer/states
 */

import { TokenKind } from './token';
import {
  binLiteral,
  classTypeName,
  constantKeywords,
  decLiteral,
  escapeRegExp,
  floatLiteral,
  floatSuffix,
  hexLiteral,
  instruction,
  intSuffix,
  keywords,
  name,
  octLiteral,
  preproTypeKeywords,
  punctuation,
  specialKeywords,
  typeKeywords,
  whitespace,
  wordAlternation
} from './rules';

export type StateName =
  | 'root'
  | 'body'
  | 'literal'
  | 'string'
  | 'string_lerp'
  | 'lerp'
  | 'selection'
  | 'prepro_class'
  | 'macro'
  | 'macro_call'
  | 'define'
  | 'field'
  | 'function'
  | 'comment';

export type Transition =
  | { type: 'push'; state: StateName }
  | { type: 'pop' }
  | { type: 'replace'; state: StateName }
  | { type: 'pushAll'; states: readonly StateName[] };

/**
 * A single lexer rule.
 *
 * `emit` is either one kind for the whole match, or one kind per top-level
 * capture group (empty groups emit nothing).
 */
export interface Rule {
  readonly pattern: RegExp;
  readonly emit: TokenKind | readonly TokenKind[];
  readonly transition?: Transition;
}

interface Mixin {
  readonly mixin: StateName;
}

type RuleEntry = Rule | Mixin;

// d: group indices, m: `$` is end of line, y: anchored at lastIndex
function rule(source: string, emit: TokenKind | readonly TokenKind[], transition?: Transition): Rule {
  return { pattern: new RegExp(source, 'dmy'), emit, transition };
}

const push = (state: StateName): Transition => ({ type: 'push', state });
const replace = (state: StateName): Transition => ({ type: 'replace', state });
const pop: Transition = { type: 'pop' };
const mixin = (state: StateName): Mixin => ({ mixin: state });

const K = TokenKind;

const declarationTail: RuleEntry[] = [
  rule('\\$\\{', K.Keyword, replace('lerp')),
  rule(whitespace, K.Text),
  rule(punctuation, K.Punctuation)
];

const definitions: Record<StateName, readonly RuleEntry[]> = {
  root: [mixin('body')],

  body: [
    rule('(\\^class)(\\s+)', [K.Keyword, K.Text], push('prepro_class')),
    rule('\\b(fun)(\\s+)(?![)=\\s])', [K.Keyword, K.Text], push('function')),
    rule('\\b(inject)(\\s+)(?![)=\\s])', [K.Keyword, K.Text], push('function')),
    rule('\\b(macro)(\\s+)', [K.Keyword, K.Text], push('macro')),
    rule('\\b(field)(\\s+)', [K.Keyword, K.Text], push('field')),
    rule('\\b(define)(\\s+)', [K.Keyword, K.Text], push('define')),
    rule(`\\b(type)(\\s+)(${name})`, [K.Keyword, K.Text, K.NameClass]),
    rule('\\b(by)(\\s+)', [K.Keyword, K.Text], push('selection')),

    // fun.name / field.name scope references
    rule(`\\b(fun)(\\s*)(\\.)(\\s*)(${name})`, [K.Keyword, K.Text, K.Punctuation, K.Text, K.NameVariable]),
    rule(`\\b(field)(\\s*)(\\.)(\\s*)(${name})`, [K.Keyword, K.Text, K.Punctuation, K.Text, K.NameVariable]),

    // Field signatures
    rule(`(\\.)(\\s*)(${name})(\\s*)(?=:)`, [K.Punctuation, K.Text, K.NameVariableInstance, K.Text]),
    // Function signatures; `>.name(` and `}.name(` are macro calls instead
    rule(`(?<![>}])(\\.)(\\s*)(${name})(\\s*)(?=\\()`, [K.Punctuation, K.Text, K.NameFunction, K.Text]),

    rule(`(?:${specialKeywords.map(escapeRegExp).join('|')})\\b`, K.Keyword),
    rule(wordAlternation(keywords), K.Keyword),
    rule(wordAlternation(preproTypeKeywords), K.Keyword),
    rule(wordAlternation(typeKeywords), K.KeywordType),
    rule(wordAlternation(constantKeywords), K.KeywordConstant),
    rule(`\\b(?:${instruction})\\b`, K.OperatorWord),

    rule(whitespace, K.Text),
    rule('\\\\\\n', K.Text), // line continuation
    rule('//.*?$', K.CommentSingle),
    rule('/[*].*[*]/', K.CommentMultiline),
    rule('/[*].*', K.CommentMultiline, push('comment')),
    rule('\\n', K.Text),

    mixin('literal'),

    rule(`(?<=[>}]\\.)(${name})(\\()`, [K.NameFunction, K.Punctuation], push('macro_call')),

    rule(classTypeName, K.NameClass),
    rule('\\)', K.Punctuation, pop),
    rule('\\(', K.Punctuation, push('body')),
    rule('\\]', K.Punctuation, pop),
    rule('\\[', K.Punctuation, push('body')),
    rule('\\$\\{', K.Keyword, push('lerp')),
    rule('\\{', K.Punctuation),
    rule('\\}', K.Punctuation),
    rule(punctuation, K.Punctuation),
    rule(name, K.NameVariable)
  ],

  literal: [
    rule('"', K.StringDouble, push('string')),
    rule("'\\\\.'|'[^\\\\]'", K.StringChar),
    rule(`${binLiteral}${intSuffix}?`, K.NumberBin),
    rule(`${hexLiteral}${intSuffix}?`, K.NumberHex),
    rule(`${octLiteral}${intSuffix}?`, K.NumberOct),
    rule(`${floatLiteral}${floatSuffix}?`, K.NumberFloat),
    rule(`${decLiteral}${floatSuffix}`, K.NumberFloat),
    rule(`${decLiteral}${intSuffix}?`, K.NumberInteger)
  ],

  selection: [rule(name, K.NameFunction, pop)],

  prepro_class: [rule(name, K.NameClass, pop)],

  string_lerp: [rule('\\}', K.StringInterpol, pop), mixin('body')],

  lerp: [rule('\\}', K.Keyword, pop), mixin('body')],

  string: [
    rule('"', K.StringDouble, pop),
    rule('\\$\\{', K.StringInterpol, push('string_lerp')),
    rule('[^"${}]+', K.StringDouble)
  ],

  macro: [
    rule(name, K.NameFunction, pop),
    rule('\\$\\{', K.Keyword, replace('lerp'))
  ],

  macro_call: [rule('\\)', K.Punctuation, pop), mixin('body')],

  define: [rule(name, K.NameVariable, pop), ...declarationTail],

  field: [
    rule(classTypeName, K.NameClass),
    rule(name, K.NameVariableInstance, pop),
    ...declarationTail
  ],

  function: [
    rule(classTypeName, K.NameClass),
    rule(`(\\.)(${name})`, [K.Punctuation, K.NameFunction], pop),
    rule(`(\\.)(<${name}>)`, [K.Punctuation, K.NameFunction], pop), // special names like <init>
    ...declarationTail
  ],

  comment: [
    rule('/[*]', K.CommentMultiline, push('comment')),
    rule('[*]/', K.CommentMultiline, pop),
    rule('[^/*]+', K.CommentMultiline),
    rule('[/*]', K.CommentMultiline)
  ]
};

function isMixin(entry: RuleEntry): entry is Mixin {
  return 'mixin' in entry;
}

function flatten(state: StateName, seen: readonly StateName[] = []): Rule[] {
  if (seen.includes(state)) {
    throw new Error(`Circular mixin: ${[...seen, state].join(' -> ')}`);
  }
  const rules: Rule[] = [];
  for (const entry of definitions[state]) {
    if (isMixin(entry)) {
      rules.push(...flatten(entry.mixin, [...seen, state]));
    } else {
      rules.push(entry);
    }
  }
  return rules;
}

const stateNames: readonly StateName[] = [
  'root', 'body', 'literal', 'string', 'string_lerp', 'lerp', 'selection',
  'prepro_class', 'macro', 'macro_call', 'define', 'field', 'function', 'comment'
];

/** Flattened rule lists, one per state */
export const states: ReadonlyMap<StateName, readonly Rule[]> = new Map(
  stateNames.map((state): [StateName, readonly Rule[]] => [state, Object.freeze(flatten(state))])
);

export function rulesFor(state: StateName): readonly Rule[] {
  return states.get(state) ?? [];
}

/**
 * Applies a transition to a stack in place. The bottom entry is never
 * popped.
 */
export function applyTransition(stack: StateName[], transition: Transition): void {
  switch (transition.type) {
    case 'push':
      stack.push(transition.state);
      break;
    case 'pop':
      if (stack.length > 1) stack.pop();
      break;
    case 'replace':
      if (stack.length > 1) stack.pop();
      stack.push(transition.state);
      break;
    case 'pushAll':
      stack.push(...transition.states);
      break;
  }
}
