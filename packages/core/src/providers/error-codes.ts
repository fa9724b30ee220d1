/**
 * Provider and registry error codes
 */
export enum ProviderErrorCode {
    // Registry
    NOT_FOUND = 'provider_not_found',
    ALREADY_REGISTERED = 'provider_already_registered',
    REGISTRY_SEALED = 'provider_registry_sealed',
    INVALID_NAME = 'provider_invalid_name',

    // Live fetches
    FETCH_FAILED = 'provider_fetch_failed',
    FETCH_TIMEOUT = 'provider_fetch_timeout',
}
