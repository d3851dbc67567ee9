/**
 * Lexer Module - JBPL Language Server
 * ===================================
 *
 * Tokenizes JBPL source into a gap-free stream of classified tokens for
 * highlighting.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → [semanticTokens.ts] → LSP client
 *
 * HOW IT WORKS:
 *   The lexer keeps an explicit stack of states (see states.ts). At the
 *   cursor it tries the rules of the top state in order; the first rule
 *   that matches emits its tokens, applies its stack transition and moves
 *   the cursor past the match.
 *
 * MALFORMED INPUT:
 *   - No rule matches → one Unclassified token for a single character.
 *     Every step consumes input, so the scan always terminates.
 *   - Unterminated strings/comments/parens → the scan still finishes; the
 *     residual stack is reported by `scan()` and turned into diagnostics
 *     by the LSP layer.
 *
 * Concatenating the `value` of all tokens always reproduces the input.
 *
 * @module jbpl/server/src/analysis/lexer/lexer
 */

import { Token, TokenKind } from './token';
import { Rule, StateName, applyTransition, rulesFor } from './states';

export interface LexOptions {
    /** Join adjacent tokens of the same kind. Default: false */
    merge?: boolean;
}

export interface LexResult {
    tokens: Token[];
    /** State stack at end of input, bottom first ('root' included) */
    stack: StateName[];
}

export class Lexer {
    private readonly stateStack: StateName[] = ['root'];
    private pos = 0;

    constructor(private readonly text: string) {}

    get done(): boolean {
        return this.pos >= this.text.length;
    }

    get offset(): number {
        return this.pos;
    }

    /** Number of states above 'root' */
    get depth(): number {
        return this.stateStack.length - 1;
    }

    get state(): StateName {
        return this.stateStack[this.stateStack.length - 1] ?? 'root';
    }

    get stack(): StateName[] {
        return [...this.stateStack];
    }

    /**
     * Fires one rule (or the fallback) and returns the tokens it produced.
     * Returns an empty array once the input is exhausted.
     */
    step(): Token[] {
        if (this.done) return [];

        for (const rule of rulesFor(this.state)) {
            rule.pattern.lastIndex = this.pos;
            const match = rule.pattern.exec(this.text);
            if (!match || match[0].length === 0) continue;

            const tokens = this.emit(rule, match);
            this.pos += match[0].length;
            if (rule.transition) applyTransition(this.stateStack, rule.transition);
            return tokens;
        }

        // Fallback: one code point, stack untouched
        const codePoint = this.text.codePointAt(this.pos) ?? 0;
        const length = codePoint > 0xffff ? 2 : 1;
        const start = this.pos;
        this.pos += length;
        return [{ kind: TokenKind.Unclassified, value: this.text.slice(start, this.pos), start, end: this.pos }];
    }

    private emit(rule: Rule, match: RegExpExecArray): Token[] {
        const start = this.pos;
        if (typeof rule.emit === 'string') {
            return [{ kind: rule.emit, value: match[0], start, end: start + match[0].length }];
        }

        const toks: Token[] = [];
        rule.emit.forEach((kind, i) => {
            const span = match.indices?.[i + 1];
            if (!span || span[1] === span[0]) return;
            toks.push({ kind, value: this.text.slice(span[0], span[1]), start: span[0], end: span[1] });
        });
        return toks;
    }
}

export function scan(text: string): LexResult {
    const lexer = new Lexer(text);
    const tokens: Token[] = [];
    while (!lexer.done) {
        tokens.push(...lexer.step());
    }
    return { tokens, stack: lexer.stack };
}

export function lex(text: string, options: LexOptions = {}): Token[] {
    const { tokens } = scan(text);
    return options.merge ? mergeTokens(tokens) : tokens;
}

/**
 * Joins runs of adjacent tokens that share a kind, e.g. the opening quote
 * and the text of a string.
 */
export function mergeTokens(tokens: readonly Token[]): Token[] {
    const merged: Token[] = [];
    for (const tok of tokens) {
        const last = merged[merged.length - 1];
        if (last && last.kind === tok.kind && last.end === tok.start) {
            merged[merged.length - 1] = { kind: last.kind, value: last.value + tok.value, start: last.start, end: tok.end };
        } else {
            merged.push(tok);
        }
    }
    return merged;
}
