import { describe, it, expect, vi } from 'vitest';
import { Chalk } from 'chalk';
import { ProviderError } from '@cdnscope/core';
import type { LookupMatch } from '@cdnscope/core';
import type { CommandOutput } from './output.js';
import { handleLookupCommand } from './lookup.js';
import { handleFetchCommand } from './fetch.js';
import { handleWarmCommand } from './warm.js';
import { handleProvidersCommand } from './providers.js';

function captureOutput() {
    const out: string[] = [];
    const err: string[] = [];
    const output: CommandOutput = {
        out: (line) => void out.push(line),
        err: (line) => void err.push(line),
        color: new Chalk({ level: 0 }),
    };
    return { output, out, err };
}

const ownership: Record<string, LookupMatch> = {
    '10.1.2.3': { provider: 'fastly', entry: '10.0.0.0/8' },
    '2001:db8::1': { provider: 'cloudflare', entry: '2001:db8::/32' },
};

const lookupService = {
    locate: vi.fn(async (ip: string) => ownership[ip] ?? null),
};

describe('lookup command', () => {
    it('prints one tab-separated line per address in argument order', async () => {
        const { output, out, err } = captureOutput();

        const code = await handleLookupCommand(
            ['10.1.2.3', '8.8.8.8', '2001:db8::1'],
            {},
            lookupService,
            output
        );

        expect(code).toBe(0);
        expect(out).toEqual(['10.1.2.3\tfastly', '8.8.8.8\t-', '2001:db8::1\tcloudflare']);
        expect(err).toEqual([]);
    });

    it('prints a JSON object with --json', async () => {
        const { output, out } = captureOutput();

        await handleLookupCommand(['10.1.2.3', '8.8.8.8'], { json: true }, lookupService, output);

        expect(out).toEqual([JSON.stringify({ '10.1.2.3': 'fastly', '8.8.8.8': null }, null, 2)]);
    });

    it('reports invalid addresses and exits with 1', async () => {
        const { output, out, err } = captureOutput();

        const code = await handleLookupCommand(['nope', '10.1.2.3'], {}, lookupService, output);

        expect(code).toBe(1);
        expect(err).toEqual(['Invalid IP address: nope']);
        expect(out).toEqual(['10.1.2.3\tfastly']);
    });
});

describe('fetch command', () => {
    it('prints each range on its own line', async () => {
        const { output, out } = captureOutput();
        const service = { fetch: vi.fn(async () => ['10.0.0.0/8', '192.0.2.0/24']) };

        await expect(handleFetchCommand('fastly', service, output)).resolves.toBe(0);
        expect(service.fetch).toHaveBeenCalledWith('fastly');
        expect(out).toEqual(['10.0.0.0/8', '192.0.2.0/24']);
    });

    it('prints the error and exits with 1', async () => {
        const { output, err } = captureOutput();
        const service = {
            fetch: vi.fn(async () => {
                throw ProviderError.notFound('nope', ['fastly']);
            }),
        };

        await expect(handleFetchCommand('nope', service, output)).resolves.toBe(1);
        expect(err).toEqual(['cdnscope fetch failed: CDN provider not found: nope. Available: fastly']);
    });
});

describe('warm command', () => {
    it('lists warmed and failed providers with a summary', async () => {
        const { output, out, err } = captureOutput();
        const service = {
            warmAll: vi.fn(async () => ({
                warmed: ['fastly', 'quic'],
                failed: [{ name: 'bunny', message: 'timed out' }],
            })),
            providers: () => ['fastly', 'bunny', 'quic'],
        };

        await expect(handleWarmCommand(service, output)).resolves.toBe(0);
        expect(out).toEqual(['✓ fastly', '✓ quic', 'Warmed 2/3 providers']);
        expect(err).toEqual(['✗ bunny: timed out']);
    });
});

describe('providers command', () => {
    it('prints provider names', () => {
        const { output, out } = captureOutput();

        expect(handleProvidersCommand({ providers: () => ['akamai', 'bunny'] }, output)).toBe(0);
        expect(out).toEqual(['akamai', 'bunny']);
    });
});
