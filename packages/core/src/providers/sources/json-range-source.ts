import type { z } from 'zod';
import { ProviderError } from '../errors.js';
import { HttpRangeSource } from './http-range-source.js';
import type { HttpRangeSourceOptions } from './http-range-source.js';

export interface JsonRangeSourceOptions<TSchema extends z.ZodTypeAny> extends HttpRangeSourceOptions {
    /** Shape of the vendor document; only the fields `select` reads need to be described */
    schema: TSchema;
    select: (payload: z.output<TSchema>) => Array<string | undefined>;
}

/**
 * JSON document whose range list lives under a vendor-specific field
 */
export class JsonRangeSource<TSchema extends z.ZodTypeAny> extends HttpRangeSource {
    private readonly schema: TSchema;
    private readonly select: (payload: z.output<TSchema>) => Array<string | undefined>;

    constructor(options: JsonRangeSourceOptions<TSchema>) {
        super({ ...options, headers: { Accept: 'application/json', ...options.headers } });
        this.schema = options.schema;
        this.select = options.select;
    }

    protected async extract(response: Response): Promise<string[]> {
        const body: unknown = await response.json();
        const parsed = this.schema.safeParse(body);
        if (!parsed.success) {
            throw ProviderError.fetchFailed(this.name, 'unexpected response shape', {
                url: this.url,
                issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
        }
        return this.select(parsed.data).filter((entry): entry is string => entry !== undefined);
    }
}
