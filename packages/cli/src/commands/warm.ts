import type { CommandOutput, WarmService } from './output.js';

/**
 * Fill every provider's cache. Individual failures are reported but do not fail the command.
 */
export async function handleWarmCommand(service: WarmService, output: CommandOutput): Promise<number> {
    const report = await service.warmAll();

    for (const name of report.warmed) {
        output.out(`${output.color.green('✓')} ${name}`);
    }
    for (const failure of report.failed) {
        output.err(`${output.color.red('✗')} ${failure.name}: ${failure.message}`);
    }

    const total = service.providers().length;
    output.out(output.color.bold(`Warmed ${report.warmed.length}/${total} providers`));
    return 0;
}
