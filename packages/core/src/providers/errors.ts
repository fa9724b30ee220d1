import { CdnscopeRuntimeError } from '../errors/CdnscopeRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ProviderErrorCode } from './error-codes.js';

/**
 * Provider error factory covering registry lookups and live range fetches
 */
export class ProviderError {
    /**
     * Requested provider name is not registered
     */
    static notFound(name: string, available: string[]) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.NOT_FOUND,
            ErrorScope.REGISTRY,
            ErrorType.NOT_FOUND,
            `CDN provider not found: ${name}. Available: ${available.join(', ') || 'none'}`,
            { name, available }
        );
    }

    static alreadyRegistered(name: string) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.ALREADY_REGISTERED,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `CDN provider '${name}' is already registered`,
            { name }
        );
    }

    static registrySealed(name: string) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.REGISTRY_SEALED,
            ErrorScope.REGISTRY,
            ErrorType.SYSTEM,
            `Cannot register '${name}': the provider registry is sealed`,
            { name }
        );
    }

    static invalidName(name: string) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.INVALID_NAME,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Invalid provider name '${name}': use letters, digits, '-' or '_'`,
            { name }
        );
    }

    /**
     * Network, HTTP or payload failure while fetching a provider's published ranges
     */
    static fetchFailed(
        provider: string,
        reason: string,
        details?: Record<string, unknown>,
        cause?: unknown
    ) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.FETCH_FAILED,
            ErrorScope.PROVIDER,
            ErrorType.THIRD_PARTY,
            `Failed to fetch ranges for ${provider}: ${reason}`,
            { provider, reason, ...details },
            { cause }
        );
    }

    static fetchTimeout(provider: string, timeoutMs: number) {
        return new CdnscopeRuntimeError(
            ProviderErrorCode.FETCH_TIMEOUT,
            ErrorScope.PROVIDER,
            ErrorType.TIMEOUT,
            `Fetching ranges for ${provider} timed out after ${timeoutMs}ms`,
            { provider, timeoutMs }
        );
    }
}
