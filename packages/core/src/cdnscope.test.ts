import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createCdnscope } from './cdnscope.js';
import type { CdnscopeDeps } from './cdnscope.js';
import { MemoryRangeCache } from './cache/memory-range-cache.js';
import { ProviderError } from './providers/errors.js';
import { ProviderErrorCode } from './providers/error-codes.js';
import type { RangeSource } from './providers/types.js';
import { CdnscopeValidationError } from './errors/CdnscopeValidationError.js';
import { createMockLogger } from './logger/test-utils.js';

function source(name: string, ranges: string[]): RangeSource {
    return { name, fetch: vi.fn(async () => ranges) };
}

function failing(name: string): RangeSource {
    return {
        name,
        fetch: vi.fn(async () => {
            throw ProviderError.fetchFailed(name, '502 Bad Gateway');
        }),
    };
}

function deps(sources: RangeSource[], overrides: CdnscopeDeps = {}): CdnscopeDeps {
    return {
        sources,
        logger: createMockLogger(),
        cacheFactory: (provider) => new MemoryRangeCache({ provider }),
        ...overrides,
    };
}

describe('createCdnscope', () => {
    it('looks up the provider that owns an address', async () => {
        const cdnscope = createCdnscope(
            {},
            deps([source('x', ['10.0.0.0/8', '203.0.113.5']), source('y', ['192.0.2.0/24'])])
        );

        await expect(cdnscope.lookup('10.1.2.3')).resolves.toBe('x');
        await expect(cdnscope.lookup('203.0.113.5')).resolves.toBe('x');
        await expect(cdnscope.lookup('8.8.8.8')).resolves.toBeNull();
        await expect(cdnscope.lookup('bogus')).resolves.toBeNull();
        await expect(cdnscope.locate('192.0.2.9')).resolves.toEqual({
            provider: 'y',
            entry: '192.0.2.0/24',
        });
    });

    it('fetches each provider once across repeated lookups', async () => {
        const x = source('x', ['10.0.0.0/8']);
        const cdnscope = createCdnscope({}, deps([x]));

        await cdnscope.lookup('10.0.0.1');
        await cdnscope.lookup('10.0.0.2');

        expect(x.fetch).toHaveBeenCalledTimes(1);
    });

    it('exposes providers by name', async () => {
        const cdnscope = createCdnscope({}, deps([source('x', ['10.0.0.0/8'])]));

        expect(cdnscope.providers()).toEqual(['x']);
        expect(cdnscope.get('x').name).toBe('x');
        await expect(cdnscope.fetch('x')).resolves.toEqual(['10.0.0.0/8']);
        await expect(cdnscope.fetch(cdnscope.get('x'))).resolves.toEqual(['10.0.0.0/8']);
        expect(() => cdnscope.get('nope')).toThrow(
            expect.objectContaining({ code: ProviderErrorCode.NOT_FOUND })
        );
    });

    it('rejects fetch for an unknown provider instead of throwing', async () => {
        const cdnscope = createCdnscope({}, deps([source('x', ['10.0.0.0/8'])]));

        await expect(cdnscope.fetch('nope')).rejects.toMatchObject({
            code: ProviderErrorCode.NOT_FOUND,
        });
    });

    it('propagates a failed fetch for a single provider', async () => {
        const cdnscope = createCdnscope({}, deps([failing('x')]));

        await expect(cdnscope.fetch('x')).rejects.toMatchObject({
            code: ProviderErrorCode.FETCH_FAILED,
        });
    });

    it('reports provider failures during lookups', async () => {
        const onProviderError = vi.fn();
        const cdnscope = createCdnscope(
            {},
            deps([failing('broken'), source('x', ['10.0.0.0/8'])], { onProviderError })
        );

        await expect(cdnscope.lookup('192.0.2.1')).resolves.toBeNull();
        expect(onProviderError).toHaveBeenCalledWith({
            provider: 'broken',
            error: expect.objectContaining({ code: ProviderErrorCode.FETCH_FAILED }),
        });
    });

    it('restricts the registry to the configured providers', () => {
        const cdnscope = createCdnscope(
            { providers: ['y'] },
            deps([source('x', []), source('y', [])])
        );

        expect(cdnscope.providers()).toEqual(['y']);
    });

    it('rejects an unknown configured provider', () => {
        expect(() => createCdnscope({ providers: ['zz'] }, deps([source('x', [])]))).toThrow(
            expect.objectContaining({
                code: ProviderErrorCode.NOT_FOUND,
                message: 'CDN provider not found: zz. Available: x',
            })
        );
    });

    it('rejects invalid configuration', () => {
        expect(() => createCdnscope({ lookup: { providerTimeoutMs: 0 } }, deps([]))).toThrow(
            CdnscopeValidationError
        );
    });

    it('warms every provider and reports failures', async () => {
        const logger = createMockLogger();
        const cdnscope = createCdnscope(
            {},
            deps([source('a', ['10.0.0.0/8']), failing('b'), source('c', ['192.0.2.0/24'])], {
                logger,
            })
        );

        await expect(cdnscope.warmAll()).resolves.toEqual({
            warmed: ['a', 'c'],
            failed: [{ name: 'b', message: 'Failed to fetch ranges for b: 502 Bad Gateway' }],
        });
        expect(logger.warn).toHaveBeenCalledWith(
            'Could not warm b: Failed to fetch ranges for b: 502 Bad Gateway'
        );
    });

    it('closes the logger on destroy', async () => {
        const logger = createMockLogger();
        const cdnscope = createCdnscope({}, deps([], { logger }));

        await cdnscope.destroy();

        expect(logger.destroy).toHaveBeenCalledTimes(1);
    });
});

describe('createCdnscope with the file cache', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdnscope-service-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('persists snapshots that a second instance reuses', async () => {
        const config = { cache: { type: 'file', directory: dir } };
        const first = source('x', ['10.0.0.0/8']);
        const second = source('x', ['172.16.0.0/12']);

        await createCdnscope(config, { sources: [first], logger: createMockLogger() }).warmAll();
        const reused = createCdnscope(config, { sources: [second], logger: createMockLogger() });

        await expect(reused.lookup('10.0.0.1')).resolves.toBe('x');
        expect(second.fetch).not.toHaveBeenCalled();
        expect(await fs.readdir(dir)).toEqual(['.x.cdn.ip.range']);
    });
});
