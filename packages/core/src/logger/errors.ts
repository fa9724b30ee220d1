import { CdnscopeRuntimeError } from '../errors/CdnscopeRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

export class LoggerError {
    static transportInitializationFailed(
        transportType: string,
        reason: string,
        details?: Record<string, unknown>
    ): CdnscopeRuntimeError {
        return new CdnscopeRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to open ${transportType} log transport: ${reason}`,
            { transportType, reason, ...details }
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): CdnscopeRuntimeError {
        return new CdnscopeRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels }
        );
    }
}
