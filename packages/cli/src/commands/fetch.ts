import { errorMessage } from '@cdnscope/core';
import type { CommandOutput, FetchService } from './output.js';

/**
 * Print one provider's cache-or-live ranges, one per line
 * @returns process exit code
 */
export async function handleFetchCommand(
    provider: string,
    service: FetchService,
    output: CommandOutput
): Promise<number> {
    try {
        const ranges = await service.fetch(provider);
        for (const range of ranges) {
            output.out(range);
        }
        return 0;
    } catch (error) {
        output.err(output.color.red(`cdnscope fetch failed: ${errorMessage(error)}`));
        return 1;
    }
}
