import { URI, Utils } from 'vscode-uri';

export function normalizeUri(uri: string): string {
    const normalized = URI.parse(uri).toString();
    // Windows drive letters arrive in either case (file:///c%3A vs file:///C%3A);
    // lowercase those URIs so one file maps to one cache key.
    if (/^file:\/\/\/[a-z]%3A/i.test(normalized)) {
        return normalized.toLowerCase();
    }
    return normalized;
}

/** Last path segment of a URI, decoded */
export function uriBasename(uri: string): string {
    return Utils.basename(URI.parse(uri));
}
