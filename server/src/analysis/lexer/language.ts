/**
 * Host-facing identity of the JBPL lexer: the tag, filename patterns and
 * media types a highlighting host uses to select it.
 *
 * @module jbpl/server/src/analysis/lexer/language
 */

export interface LanguageDescriptor {
    readonly tag: string;
    readonly title: string;
    readonly description: string;
    readonly filenames: readonly string[];
    readonly mimetypes: readonly string[];
}

export const JBPL_LANGUAGE: LanguageDescriptor = {
    tag: 'jbpl',
    title: 'JBPL',
    description: 'Java Bytecode Patch Language',
    filenames: ['*.jbpl'],
    mimetypes: ['text/x-jbpl']
};

function globToRegExp(glob: string): RegExp {
    const source = glob
        .split('*')
        .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${source}$`);
}

const filenamePatterns = JBPL_LANGUAGE.filenames.map(globToRegExp);

/** Matches the basename of a path or URI against the filename patterns. */
export function matchesFilename(path: string): boolean {
    const basename = path.split(/[\\/]/).pop() ?? '';
    return filenamePatterns.some(re => re.test(basename));
}

/** Parameters such as `; charset=utf-8` are ignored. */
export function matchesMimetype(type: string): boolean {
    const essence = type.split(';')[0]?.trim().toLowerCase() ?? '';
    return JBPL_LANGUAGE.mimetypes.includes(essence);
}
