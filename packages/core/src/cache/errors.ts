import { CdnscopeRuntimeError } from '../errors/CdnscopeRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { CacheErrorCode } from './error-codes.js';

/**
 * Cache error factory with typed methods for creating cache-specific errors
 */
export class CacheError {
    static writeFailed(provider: string, reason: string, details?: Record<string, unknown>) {
        return new CdnscopeRuntimeError(
            CacheErrorCode.WRITE_FAILED,
            ErrorScope.CACHE,
            ErrorType.SYSTEM,
            `Failed to write range cache for ${provider}: ${reason}`,
            { provider, reason, ...details }
        );
    }

    static invalidConfig(message: string) {
        return new CdnscopeRuntimeError(
            CacheErrorCode.INVALID_CONFIG,
            ErrorScope.CACHE,
            ErrorType.USER,
            `Invalid cache configuration: ${message}`,
            { message }
        );
    }

    static unknownType(type: string, availableTypes: readonly string[]) {
        return new CdnscopeRuntimeError(
            CacheErrorCode.UNKNOWN_TYPE,
            ErrorScope.CACHE,
            ErrorType.USER,
            `Unknown cache type '${type}'. Available: ${availableTypes.join(', ')}`,
            { type, availableTypes }
        );
    }
}
