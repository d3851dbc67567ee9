import { DEFAULT_SETTINGS, resolveSettings } from '../server/src/util/config';

test('missing settings fall back to defaults', () => {
    expect(resolveSettings(undefined)).toEqual(DEFAULT_SETTINGS);
    expect(resolveSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(resolveSettings('jbpl')).toEqual(DEFAULT_SETTINGS);
});

test('valid values override defaults', () => {
    expect(resolveSettings({ reportUnclassified: false, maxNumberOfProblems: 5 })).toEqual({
        reportUnclassified: false,
        reportUnterminated: true,
        maxNumberOfProblems: 5,
    });
});

test('invalid values are ignored one by one', () => {
    expect(resolveSettings({ reportUnterminated: 'yes', maxNumberOfProblems: -1, reportUnclassified: false })).toEqual({
        reportUnclassified: false,
        reportUnterminated: true,
        maxNumberOfProblems: 100,
    });
    expect(resolveSettings({ maxNumberOfProblems: 2.5 }).maxNumberOfProblems).toBe(100);
});
