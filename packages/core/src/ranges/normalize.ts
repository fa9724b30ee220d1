const EDGE_WHITESPACE = /^[\s\r\t]+|[\s\r\t]+$/g;

/**
 * Trims every line and drops the ones left empty, keeping input order.
 * Idempotent: normalizing an already-normalized list returns it unchanged.
 */
export function normalizeLines(lines: readonly string[]): string[] {
    const result: string[] = [];
    for (const line of lines) {
        if (line === '') {
            continue;
        }
        const trimmed = line.replace(EDGE_WHITESPACE, '');
        if (trimmed !== '') {
            result.push(trimmed);
        }
    }
    return result;
}

/**
 * Splits a raw provider payload into normalized range entries.
 */
export function splitLines(text: string, separator: string | RegExp = '\n'): string[] {
    return normalizeLines(text.split(separator));
}
