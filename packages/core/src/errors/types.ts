import type { CacheErrorCode } from '../cache/error-codes.js';
import type { ConfigErrorCode } from '../config/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { ProviderErrorCode } from '../providers/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CACHE = 'cache', // Range snapshot persistence and freshness
    PROVIDER = 'provider', // Provider adapters and live range fetches
    REGISTRY = 'registry', // Provider registration and lookup by name
    ENGINE = 'engine', // Membership queries across providers
    CONFIG = 'config', // Configuration file operations, parsing, validation
    LOGGER = 'logger', // Logging system operations, transports, and configuration
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (provider, config file)
    TIMEOUT = 'timeout', // 408 - operation timed out
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream provider failures
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type CdnscopeErrorCode =
    | CacheErrorCode
    | ConfigErrorCode
    | LoggerErrorCode
    | ProviderErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: CdnscopeErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
