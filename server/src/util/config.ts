import { Connection } from 'vscode-languageserver';

/**
 * Client settings under the `jbpl` section
 */
export interface JbplSettings {
    /** Report each run of unrecognized characters */
    reportUnclassified: boolean;
    /** Report strings, comments, interpolations and parens left open at end of file */
    reportUnterminated: boolean;
    maxNumberOfProblems: number;
}

export const DEFAULT_SETTINGS: Readonly<JbplSettings> = {
    reportUnclassified: true,
    reportUnterminated: true,
    maxNumberOfProblems: 100
};

/**
 * Validates a raw settings object; invalid or missing values fall back to
 * the defaults one by one.
 */
export function resolveSettings(raw: unknown): JbplSettings {
    const settings: JbplSettings = { ...DEFAULT_SETTINGS };
    if (typeof raw !== 'object' || raw === null) {
        return settings;
    }

    if ('reportUnclassified' in raw && typeof raw.reportUnclassified === 'boolean') {
        settings.reportUnclassified = raw.reportUnclassified;
    }
    if ('reportUnterminated' in raw && typeof raw.reportUnterminated === 'boolean') {
        settings.reportUnterminated = raw.reportUnterminated;
    }
    if (
        'maxNumberOfProblems' in raw &&
        typeof raw.maxNumberOfProblems === 'number' &&
        Number.isInteger(raw.maxNumberOfProblems) &&
        raw.maxNumberOfProblems > 0
    ) {
        settings.maxNumberOfProblems = raw.maxNumberOfProblems;
    }
    return settings;
}

export async function getConfiguration(connection: Connection): Promise<JbplSettings> {
    try {
        const raw: unknown = await connection.workspace.getConfiguration({ section: 'jbpl' });
        return resolveSettings(raw);
    } catch (err) {
        console.warn(`Failed to read jbpl settings, using defaults – ${String(err)}`);
        return { ...DEFAULT_SETTINGS };
    }
}
