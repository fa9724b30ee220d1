import { HttpRangeSource } from './http-range-source.js';
import type { HttpRangeSourceOptions } from './http-range-source.js';

/** IPv4 address with an optional prefix length */
export const IPV4_RANGE_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}(?:\/\d{1,2})?\b/g;

export interface PatternRangeSourceOptions extends HttpRangeSourceOptions {
    /** Token pattern (defaults to IPv4 addresses and CIDR blocks) */
    pattern?: RegExp;
    /**
     * Narrows the page to the first capture group of this pattern before tokens are
     * collected, e.g. the first code block of a documentation page
     */
    section?: RegExp;
}

/**
 * Page (usually HTML) that embeds its ranges in prose or markup.
 * Tokens are collected in page order with duplicates removed.
 */
export class PatternRangeSource extends HttpRangeSource {
    private readonly pattern: RegExp;
    private readonly section: RegExp | undefined;

    constructor(options: PatternRangeSourceOptions) {
        super({ ...options, headers: { Accept: 'text/html', ...options.headers } });
        this.pattern = options.pattern ?? IPV4_RANGE_PATTERN;
        this.section = options.section;
    }

    protected async extract(response: Response): Promise<string[]> {
        const body = await response.text();
        return extractTokens(body, this.pattern, this.section);
    }
}

export function extractTokens(body: string, pattern: RegExp, section?: RegExp): string[] {
    let scope = body;
    if (section) {
        const found = section.exec(body);
        scope = found?.[1] ?? '';
    }
    const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
    return [...new Set(Array.from(scope.matchAll(global), (match) => match[0]))];
}
