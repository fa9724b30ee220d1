import type { CommandOutput, ProvidersService } from './output.js';

export function handleProvidersCommand(service: ProvidersService, output: CommandOutput): number {
    for (const name of service.providers()) {
        output.out(name);
    }
    return 0;
}
