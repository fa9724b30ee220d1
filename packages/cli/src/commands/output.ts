import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { Cdnscope } from '@cdnscope/core';

/**
 * Where command handlers write. Injected so handlers can be exercised without a terminal.
 */
export interface CommandOutput {
    out(line: string): void;
    err(line: string): void;
    color: ChalkInstance;
}

export const consoleOutput: CommandOutput = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    color: chalk,
};

export type LookupService = Pick<Cdnscope, 'locate'>;
export type FetchService = Pick<Cdnscope, 'fetch'>;
export type WarmService = Pick<Cdnscope, 'warmAll' | 'providers'>;
export type ProvidersService = Pick<Cdnscope, 'providers'>;
