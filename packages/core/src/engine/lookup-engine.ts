import type { Logger } from '../logger/types.js';
import { CdnscopeLogComponent } from '../logger/types.js';
import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import { ProviderError } from '../providers/errors.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { RangeProvider } from '../providers/types.js';
import { findMatchingEntry, parseTarget } from '../ranges/match.js';
import type { TargetAddress } from '../ranges/match.js';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

export interface LookupMatch {
    provider: string;
    /** The range entry that contained the address */
    entry: string;
}

export interface ProviderFailure {
    provider: string;
    error: unknown;
}

export interface LookupEngineOptions {
    registry: ProviderRegistry<RangeProvider>;
    logger: Logger;
    /** Upper bound for one provider's cache-or-live fetch */
    providerTimeoutMs?: number;
    /** Upper bound for a whole lookup; unset means the slowest provider decides */
    queryTimeoutMs?: number;
    /** Called for every provider whose fetch fails or times out during a lookup */
    onProviderError?: (failure: ProviderFailure) => void;
}

type Timer = ReturnType<typeof setTimeout>;

/**
 * Fans a membership query out to every registered provider at once.
 *
 * The first provider to report a containing entry wins; if the same address is claimed by
 * several providers, whichever finishes first is returned. Provider failures never fail the
 * lookup: they are logged, reported to `onProviderError` and treated as "no match".
 */
export class LookupEngine {
    private readonly registry: ProviderRegistry<RangeProvider>;
    private readonly logger: Logger;
    private readonly providerTimeoutMs: number;
    private readonly queryTimeoutMs: number | undefined;
    private readonly onProviderError: ((failure: ProviderFailure) => void) | undefined;

    constructor(options: LookupEngineOptions) {
        this.registry = options.registry;
        this.logger = options.logger.createChild(CdnscopeLogComponent.ENGINE);
        this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
        this.queryTimeoutMs = options.queryTimeoutMs;
        this.onProviderError = options.onProviderError;
    }

    /**
     * Resolves to the first provider whose ranges contain `ip`, or null when none does.
     * Never rejects; an unparseable address resolves to null.
     */
    async locate(ip: string): Promise<LookupMatch | null> {
        const target = parseTarget(ip);
        if (!target) {
            this.logger.debug(`Ignoring lookup of invalid address '${ip}'`);
            return null;
        }

        const providers = Array.from(this.registry.all());
        if (providers.length === 0) {
            return null;
        }

        const query = new AbortController();

        return new Promise<LookupMatch | null>((resolve) => {
            let pending = providers.length;
            let settled = false;
            let queryTimer: Timer | undefined;

            const finish = (result: LookupMatch | null): void => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(queryTimer);
                // Losing tasks stop their fetches and discard whatever they find
                query.abort();
                if (result) {
                    this.logger.debug(`${target.canonical} matched ${result.provider}`, {
                        entry: result.entry,
                    });
                }
                resolve(result);
            };

            if (this.queryTimeoutMs !== undefined) {
                const timeoutMs = this.queryTimeoutMs;
                queryTimer = setTimeout(() => {
                    this.logger.debug(`Lookup of ${target.canonical} timed out after ${timeoutMs}ms`);
                    finish(null);
                }, timeoutMs);
            }

            for (const [name, provider] of providers) {
                void this.probe(name, provider, target, query.signal)
                    .then((entry) => {
                        if (entry !== null) {
                            finish({ provider: name, entry });
                        }
                    })
                    .finally(() => {
                        // Completion barrier: the last task to settle without a match ends the query
                        pending -= 1;
                        if (pending === 0) {
                            finish(null);
                        }
                    });
            }
        });
    }

    /**
     * One provider's task. Resolves to the matching entry or null; never rejects.
     */
    private async probe(
        name: string,
        provider: RangeProvider,
        target: TargetAddress,
        querySignal: AbortSignal
    ): Promise<string | null> {
        const fetchController = new AbortController();
        let interrupt: (reason: unknown) => void = () => {};
        const interrupted = new Promise<never>((_, reject) => {
            interrupt = reject;
        });
        const timer = setTimeout(() => {
            interrupt(ProviderError.fetchTimeout(name, this.providerTimeoutMs));
        }, this.providerTimeoutMs);
        const onQueryAbort = (): void => interrupt(querySignal.reason);
        querySignal.addEventListener('abort', onQueryAbort, { once: true });

        try {
            const ranges = await Promise.race([
                provider.fetchWithCache({ signal: fetchController.signal }),
                interrupted,
            ]);
            return findMatchingEntry(ranges, target);
        } catch (error) {
            if (!querySignal.aborted) {
                this.reportFailure(name, error);
            }
            return null;
        } finally {
            clearTimeout(timer);
            querySignal.removeEventListener('abort', onQueryAbort);
            // Stop a fetch that lost the race against the timeout or the query
            fetchController.abort();
        }
    }

    private reportFailure(provider: string, error: unknown): void {
        this.logger.debug(`Provider ${provider} skipped: ${errorMessage(error)}`);
        if (!this.onProviderError) {
            return;
        }
        try {
            this.onProviderError({ provider, error });
        } catch (hookError) {
            this.logger.warn(`onProviderError hook threw: ${errorMessage(hookError)}`);
        }
    }
}
