import type { CdnscopeErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error thrown across cdnscope.
 * Carries a typed code, the scope that raised it and a type that maps to an HTTP status.
 */
export class CdnscopeRuntimeError<C = Record<string, unknown>> extends Error {
    readonly code: CdnscopeErrorCode | string;
    readonly scope: ErrorScope | string;
    readonly type: ErrorType;
    readonly context: C | undefined;

    constructor(
        code: CdnscopeErrorCode | string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'CdnscopeRuntimeError';
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            ...(this.context !== undefined && { context: this.context }),
        };
    }
}

/**
 * Best-effort conversion of an unknown thrown value into a message string
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
