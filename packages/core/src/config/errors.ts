import type { z } from 'zod';
import { CdnscopeRuntimeError } from '../errors/CdnscopeRuntimeError.js';
import { CdnscopeValidationError } from '../errors/CdnscopeValidationError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config error factory covering file loading and schema validation
 */
export class ConfigError {
    static fileNotFound(configPath: string) {
        return new CdnscopeRuntimeError(
            ConfigErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.NOT_FOUND,
            `Configuration file not found: ${configPath}`,
            { configPath }
        );
    }

    static fileReadError(configPath: string, reason: string) {
        return new CdnscopeRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Error reading configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }

    static parseError(configPath: string, reason: string) {
        return new CdnscopeRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file ${configPath}: ${reason}`,
            { configPath, reason }
        );
    }

    /**
     * One issue per zod issue, keeping the path into the config
     */
    static invalid(zodError: z.ZodError): CdnscopeValidationError {
        const issues: Issue[] = zodError.issues.map((issue) => ({
            code: ConfigErrorCode.INVALID,
            message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
            scope: ErrorScope.CONFIG,
            type: ErrorType.USER,
            severity: 'error',
            path: issue.path,
        }));
        return new CdnscopeValidationError(issues);
    }
}
