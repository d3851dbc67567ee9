/**
 * Diagnostics - JBPL LSP
 * ======================
 *
 * The lexer never fails; malformed input shows up as Unclassified tokens and
 * as states still open at end of input. This module turns both into
 * warnings:
 *
 *   $$ foo        → "Unrecognized input '$$'"  (one per run of characters)
 *   "abc<EOF>     → "Unterminated string literal" at end of document
 *
 * @module jbpl/server/src/lsp/diagnostics
 */

import { Diagnostic, DiagnosticSeverity } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { LexResult, mergeTokens } from '../analysis/lexer/lexer';
import { StateName } from '../analysis/lexer/states';
import { TokenKind } from '../analysis/lexer/token';
import { JbplSettings } from '../util/config';

export const DIAGNOSTIC_SOURCE = 'jbpl';

const constructLabels: Record<StateName, string> = {
    root: 'construct',
    body: 'parenthesis or bracket',
    literal: 'literal',
    string: 'string literal',
    string_lerp: 'string interpolation',
    lerp: 'interpolation',
    selection: 'selector',
    prepro_class: '^class reference',
    macro: 'macro declaration',
    macro_call: 'macro call',
    define: 'define directive',
    field: 'field declaration',
    function: 'function declaration',
    comment: 'block comment'
};

export function describeState(state: StateName): string {
    return constructLabels[state];
}

export function computeDiagnostics(doc: TextDocument, result: LexResult, settings: JbplSettings): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    if (settings.reportUnclassified) {
        for (const tok of mergeTokens(result.tokens)) {
            if (tok.kind !== TokenKind.Unclassified) continue;
            diagnostics.push({
                range: { start: doc.positionAt(tok.start), end: doc.positionAt(tok.end) },
                severity: DiagnosticSeverity.Warning,
                code: 'unclassified',
                source: DIAGNOSTIC_SOURCE,
                message: `Unrecognized input '${tok.value}'`
            });
        }
    }

    const innermost = result.stack[result.stack.length - 1];
    if (settings.reportUnterminated && result.stack.length > 1 && innermost) {
        const end = doc.positionAt(doc.getText().length);
        diagnostics.push({
            range: { start: end, end },
            severity: DiagnosticSeverity.Warning,
            code: 'unterminated',
            source: DIAGNOSTIC_SOURCE,
            message: `Unterminated ${describeState(innermost)}`
        });
    }

    return diagnostics.slice(0, settings.maxNumberOfProblems);
}
