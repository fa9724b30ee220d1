#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import {
    createCdnscope,
    loadConfig,
    CdnscopeValidationError,
    errorMessage,
} from '@cdnscope/core';
import type { Cdnscope, ConfigOverrides } from '@cdnscope/core';
import {
    consoleOutput,
    handleFetchCommand,
    handleLookupCommand,
    handleProvidersCommand,
    handleWarmCommand,
} from './commands/index.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

interface GlobalOptions {
    config?: string;
    cacheDir?: string;
    logLevel?: string;
}

const program = new Command();

program
    .name('cdnscope')
    .description('Identify which CDN publishes the range containing an IP address')
    .version(pkg.version)
    .option('-c, --config <file>', 'YAML configuration file')
    .option('--cache-dir <dir>', 'Directory for provider range snapshots')
    .option('--log-level <level>', 'error | warn | info | debug | silly');

async function withService(run: (service: Cdnscope) => Promise<number> | number): Promise<void> {
    const options = program.opts<GlobalOptions>();
    let service: Cdnscope | undefined;
    try {
        const overrides: ConfigOverrides = {
            ...(options.cacheDir !== undefined && { cacheDir: options.cacheDir }),
            ...(options.logLevel !== undefined && { logLevel: options.logLevel }),
        };
        const config = await loadConfig({ configPath: options.config, overrides });
        service = createCdnscope(config);
        process.exitCode = await run(service);
    } catch (error) {
        if (error instanceof CdnscopeValidationError) {
            for (const issue of error.errors) {
                consoleOutput.err(consoleOutput.color.red(`✗ ${issue.message}`));
            }
        } else {
            consoleOutput.err(consoleOutput.color.red(`cdnscope: ${errorMessage(error)}`));
        }
        process.exitCode = 1;
    } finally {
        await service?.destroy();
    }
}

program
    .command('lookup')
    .description('Find the CDN that owns each address')
    .argument('<ip...>', 'IPv4 or IPv6 addresses')
    .option('--json', 'Print results as a JSON object', false)
    .action(async (ips: string[], options: { json: boolean }) => {
        await withService((service) =>
            handleLookupCommand(ips, { json: options.json }, service, consoleOutput)
        );
    });

program
    .command('fetch')
    .description("Print a provider's published ranges (cached for up to 7 days)")
    .argument('<provider>', 'Provider name, see `cdnscope providers`')
    .action(async (provider: string) => {
        await withService((service) => handleFetchCommand(provider, service, consoleOutput));
    });

program
    .command('warm')
    .description('Fetch and cache every provider’s ranges')
    .action(async () => {
        await withService((service) => handleWarmCommand(service, consoleOutput));
    });

program
    .command('providers')
    .description('List provider names')
    .action(async () => {
        await withService((service) => handleProvidersCommand(service, consoleOutput));
    });

await program.parseAsync();
