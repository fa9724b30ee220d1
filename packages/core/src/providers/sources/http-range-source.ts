import { CdnscopeRuntimeError, errorMessage } from '../../errors/CdnscopeRuntimeError.js';
import { normalizeLines } from '../../ranges/normalize.js';
import { ProviderError } from '../errors.js';
import type { RangeFetchOptions, RangeSource } from '../types.js';

export const DEFAULT_USER_AGENT = 'cdnscope/0.1.0';

export interface HttpRangeSourceOptions {
    name: string;
    url: string;
    headers?: Record<string, string>;
}

/**
 * Shared GET-and-extract flow for providers that publish their ranges over HTTP.
 * Subclasses only turn a successful response into raw entries.
 */
export abstract class HttpRangeSource implements RangeSource {
    readonly name: string;
    readonly url: string;
    protected readonly headers: Record<string, string>;

    constructor(options: HttpRangeSourceOptions) {
        this.name = options.name;
        this.url = options.url;
        this.headers = { 'User-Agent': DEFAULT_USER_AGENT, ...options.headers };
    }

    protected abstract extract(response: Response): Promise<string[]>;

    async fetch(options: RangeFetchOptions = {}): Promise<string[]> {
        let response: Response;
        try {
            response = await fetch(this.url, {
                signal: options.signal,
                headers: this.headers,
            });
        } catch (error) {
            throw ProviderError.fetchFailed(this.name, errorMessage(error), { url: this.url }, error);
        }

        if (!response.ok) {
            throw ProviderError.fetchFailed(
                this.name,
                `${response.status} ${response.statusText}`,
                { url: this.url, status: response.status }
            );
        }

        try {
            return normalizeLines(await this.extract(response));
        } catch (error) {
            if (error instanceof CdnscopeRuntimeError) {
                throw error;
            }
            throw ProviderError.fetchFailed(
                this.name,
                `unreadable payload: ${errorMessage(error)}`,
                { url: this.url },
                error
            );
        }
    }
}
