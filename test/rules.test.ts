import {
    binLiteral,
    escapeRegExp,
    floatLiteral,
    hexLiteral,
    instruction,
    instructionCategories,
    instructionOrder,
    name,
    octLiteral,
    wordAlternation
} from '../server/src/analysis/lexer/rules';
import { StateName, Transition, applyTransition, rulesFor, states } from '../server/src/analysis/lexer/states';
import { TokenKind, tokenKindParts } from '../server/src/analysis/lexer/token';

// ── Pattern library ────────────────────────────────────────────────────

test('every instruction category is part of the combined recognizer', () => {
    expect([...instructionOrder].sort()).toEqual(Object.keys(instructionCategories).sort());
    expect(instructionOrder).toHaveLength(13);
    const re = new RegExp(`^(?:${instruction})$`);
    for (const mnemonic of ['aconst_null', 'dup2_x1', 'getstatic', 'jsr', 'l2i', 'lushr',
        'fneg', 'arraylength', 'monitorexit', 'tableswitch', 'checkcast', 'if_icmpge', 'invokedynamic']) {
        expect(re.test(mnemonic)).toBe(true);
    }
});

test('literal grammars need a leading digit before any separator', () => {
    const whole = (source: string) => new RegExp(`^(?:${source})$`);
    expect(whole(binLiteral).test('0b1_0')).toBe(true);
    expect(whole(binLiteral).test('0b_1')).toBe(false);
    expect(whole(hexLiteral).test('0xCAFE_babe')).toBe(true);
    expect(whole(hexLiteral).test('0x_F')).toBe(false);
    expect(whole(octLiteral).test('0o7_7')).toBe(true);
    expect(whole(octLiteral).test('0o8')).toBe(false);
    expect(whole(floatLiteral).test('1_000.5e1_0')).toBe(true);
    expect(whole(floatLiteral).test('1_000')).toBe(false);
    expect(whole(name).test('_a$1')).toBe(true);
    expect(whole(name).test('1a')).toBe(false);
});

test('wordAlternation escapes and bounds the words', () => {
    expect(escapeRegExp('^return')).toBe('\\^return');
    expect(wordAlternation(['a.b', 'c'])).toBe('\\b(?:a\\.b|c)\\b');
});

test('tokenKindParts expands the kind hierarchy', () => {
    expect(tokenKindParts(TokenKind.NameVariableInstance)).toEqual([
        'Name',
        'Name.Variable',
        'Name.Variable.Instance',
    ]);
    expect(tokenKindParts(TokenKind.Unclassified)).toEqual(['Error']);
});

// ── State tables ───────────────────────────────────────────────────────

test('mixins are flattened at their position', () => {
    const body = rulesFor('body');
    const literal = rulesFor('literal');
    expect(rulesFor('root')).toEqual(body);
    expect(rulesFor('string_lerp')).toHaveLength(body.length + 1);
    expect(rulesFor('string_lerp').slice(1)).toEqual(body);
    // literal rules sit inside body, before the macro call rule
    const firstLiteral = body.indexOf(literal[0]);
    expect(body.slice(firstLiteral, firstLiteral + literal.length)).toEqual(literal);
});

test('every state has rules', () => {
    expect(states.size).toBe(14);
    for (const [, rules] of states) {
        expect(rules.length).toBeGreaterThan(0);
    }
});

describe('applyTransition', () => {
    const run = (stack: StateName[], transition: Transition): StateName[] => {
        const copy = [...stack];
        applyTransition(copy, transition);
        return copy;
    };

    test('push and pop', () => {
        expect(run(['root'], { type: 'push', state: 'string' })).toEqual(['root', 'string']);
        expect(run(['root', 'string'], { type: 'pop' })).toEqual(['root']);
    });

    test('pop never removes the root state', () => {
        expect(run(['root'], { type: 'pop' })).toEqual(['root']);
    });

    test('replace swaps the top state', () => {
        expect(run(['root', 'macro'], { type: 'replace', state: 'lerp' })).toEqual(['root', 'lerp']);
        expect(run(['root'], { type: 'replace', state: 'lerp' })).toEqual(['root', 'lerp']);
    });

    test('pushAll pushes in order', () => {
        expect(run(['root'], { type: 'pushAll', states: ['body', 'string'] })).toEqual(['root', 'body', 'string']);
    });
});
