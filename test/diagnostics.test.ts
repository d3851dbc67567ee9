import { DiagnosticSeverity } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { scan } from '../server/src/analysis/lexer/lexer';
import { computeDiagnostics, describeState } from '../server/src/lsp/diagnostics';
import { DEFAULT_SETTINGS, JbplSettings } from '../server/src/util/config';

function diagnose(text: string, settings: JbplSettings = DEFAULT_SETTINGS) {
    const doc = TextDocument.create('file:///test.jbpl', 'jbpl', 1, text);
    return computeDiagnostics(doc, scan(text), settings);
}

test('clean input has no diagnostics', () => {
    expect(diagnose('field <Foo> bar\nnop')).toEqual([]);
});

test('runs of unrecognized characters are reported once', () => {
    expect(diagnose('a @@ b')).toEqual([
        {
            range: { start: { line: 0, character: 2 }, end: { line: 0, character: 4 } },
            severity: DiagnosticSeverity.Warning,
            code: 'unclassified',
            source: 'jbpl',
            message: "Unrecognized input '@@'",
        },
    ]);
});

test('unterminated construct is reported at end of document', () => {
    expect(diagnose('x\n"abc')).toEqual([
        {
            range: { start: { line: 1, character: 4 }, end: { line: 1, character: 4 } },
            severity: DiagnosticSeverity.Warning,
            code: 'unterminated',
            source: 'jbpl',
            message: 'Unterminated string literal',
        },
    ]);
});

test('innermost open state names the construct', () => {
    expect(diagnose('(/* x').map(d => d.message)).toEqual(['Unterminated block comment']);
    expect(describeState('lerp')).toBe('interpolation');
});

test('settings switch reports off and cap the count', () => {
    const off: JbplSettings = { ...DEFAULT_SETTINGS, reportUnclassified: false, reportUnterminated: false };
    expect(diagnose('@ "x', off)).toEqual([]);

    const capped: JbplSettings = { ...DEFAULT_SETTINGS, maxNumberOfProblems: 1 };
    expect(diagnose('@ # "x', capped).map(d => d.message)).toEqual(["Unrecognized input '@'"]);
});
