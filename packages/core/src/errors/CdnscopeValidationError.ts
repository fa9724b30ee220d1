import type { Issue } from './types.js';

/**
 * Thrown when one or more validation issues are found.
 * The first error-severity issue becomes the message.
 */
export class CdnscopeValidationError extends Error {
    readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const primary = issues.find((issue) => issue.severity === 'error') ?? issues[0];
        super(primary?.message ?? 'Validation failed');
        this.name = 'CdnscopeValidationError';
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((issue) => issue.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
        };
    }
}
