import { parseTarget } from '@cdnscope/core';
import type { LookupMatch } from '@cdnscope/core';
import type { CommandOutput, LookupService } from './output.js';

export interface LookupCommandOptions {
    json?: boolean;
}

type LookupOutcome =
    | { ip: string; valid: false }
    | { ip: string; valid: true; match: LookupMatch | null };

/**
 * Look up every address concurrently and print one line per address, in argument order.
 * @returns process exit code: 1 if any address was invalid
 */
export async function handleLookupCommand(
    ips: string[],
    options: LookupCommandOptions,
    service: LookupService,
    output: CommandOutput
): Promise<number> {
    const outcomes = await Promise.all(
        ips.map(async (ip): Promise<LookupOutcome> => {
            if (!parseTarget(ip)) {
                return { ip, valid: false };
            }
            return { ip, valid: true, match: await service.locate(ip) };
        })
    );

    let exitCode = 0;
    for (const outcome of outcomes) {
        if (!outcome.valid) {
            output.err(output.color.red(`Invalid IP address: ${outcome.ip}`));
            exitCode = 1;
        }
    }

    if (options.json) {
        const results: Record<string, string | null> = {};
        for (const outcome of outcomes) {
            if (outcome.valid) {
                results[outcome.ip] = outcome.match?.provider ?? null;
            }
        }
        output.out(JSON.stringify(results, null, 2));
        return exitCode;
    }

    for (const outcome of outcomes) {
        if (!outcome.valid) {
            continue;
        }
        const provider = outcome.match
            ? output.color.green(outcome.match.provider)
            : output.color.dim('-');
        output.out(`${outcome.ip}\t${provider}`);
    }
    return exitCode;
}
