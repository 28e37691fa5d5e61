/**
 * @fileoverview Comparison helpers shared by the catalog and the selection engine.
 * @module modules/catalog/normalize
 * @version 1.0.0
 */

/** Key used for case-insensitive, whitespace-trimmed comparisons. */
export function normalizeKey(value: string): string {
    return value.trim().toLowerCase();
}

/** Case-insensitive equality after trimming. */
export function sameKey(a: string, b: string): boolean {
    return normalizeKey(a) === normalizeKey(b);
}

/** Natural order: "Area 2" sorts before "Area 10", case is ignored. */
export function naturalCompare(a: string, b: string): number {
    return a.localeCompare(b, 'en', { numeric: true, sensitivity: 'base' });
}

/** Plain code-point order. */
export function lexicalCompare(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * De-duplicate case-insensitively, keeping the first-seen spelling.
 */
export function distinctPreservingCase(values: Iterable<string>): string[] {
    const seen = new Map<string, string>();
    for (const value of values) {
        const key = normalizeKey(value);
        if (key && !seen.has(key)) {
            seen.set(key, value.trim());
        }
    }
    return [...seen.values()];
}
