import { HttpRangeSource } from './http-range-source.js';
import type { HttpRangeSourceOptions } from './http-range-source.js';

export interface TextRangeSourceOptions extends HttpRangeSourceOptions {
    /** Defaults to a newline */
    separator?: string | RegExp;
}

/**
 * Plain-text list with one entry per separator-delimited chunk
 */
export class TextRangeSource extends HttpRangeSource {
    private readonly separator: string | RegExp;

    constructor(options: TextRangeSourceOptions) {
        super(options);
        this.separator = options.separator ?? '\n';
    }

    protected async extract(response: Response): Promise<string[]> {
        const body = await response.text();
        return body.split(this.separator);
    }
}
