/**
 * Parse an absolute URL, returning null instead of throwing.
 */
export function parseUrl(value: string): URL | null {
    try {
        return new URL(value);
    }
    catch {
        return null;
    }
}
