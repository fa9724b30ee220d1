export interface RangeFetchOptions {
    signal?: AbortSignal;
}

/**
 * Adapter for one provider's published range list. The only component that performs
 * network I/O.
 */
export interface RangeSource {
    readonly name: string;

    /**
     * @returns normalized range entries (CIDR blocks or single addresses)
     * @throws CdnscopeRuntimeError (provider_fetch_failed) on network or payload errors
     */
    fetch(options?: RangeFetchOptions): Promise<string[]>;
}

/**
 * Anything the lookup engine can ask for a provider's current range list
 */
export interface RangeProvider {
    readonly name: string;
    fetchWithCache(options?: RangeFetchOptions): Promise<string[]>;
}
