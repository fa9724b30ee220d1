import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    BUILTIN_PROVIDER_NAMES,
    createBuiltinSources,
    isBuiltinProviderName,
} from './builtin.js';
import { HttpRangeSource } from './sources/http-range-source.js';

function sourceNamed(name: (typeof BUILTIN_PROVIDER_NAMES)[number]) {
    const [source] = createBuiltinSources([name]);
    if (!(source instanceof HttpRangeSource)) {
        throw new Error(`expected an HTTP source for ${name}`);
    }
    return source;
}

describe('built-in providers', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('creates every built-in provider in list order', () => {
        const sources = createBuiltinSources();
        expect(sources.map((source) => source.name)).toEqual([...BUILTIN_PROVIDER_NAMES]);
        expect(BUILTIN_PROVIDER_NAMES).toHaveLength(10);
    });

    it('creates only the requested providers', () => {
        expect(createBuiltinSources(['quic', 'fastly']).map((source) => source.name)).toEqual([
            'quic',
            'fastly',
        ]);
    });

    it('recognises built-in names', () => {
        expect(isBuiltinProviderName('cloudflare')).toBe(true);
        expect(isBuiltinProviderName('example')).toBe(false);
    });

    it('reads the Cloudflare plain-text list', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('173.245.48.0/20\n103.21.244.0/22\n')));
        const cloudflare = sourceNamed('cloudflare');

        expect(cloudflare.url).toBe('https://www.cloudflare.com/ips-v4');
        await expect(cloudflare.fetch()).resolves.toEqual(['173.245.48.0/20', '103.21.244.0/22']);
    });

    it('reads the Fastly address list', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => new Response(JSON.stringify({ addresses: ['23.235.32.0/20'], ipv6_addresses: [] })))
        );

        await expect(sourceNamed('fastly').fetch()).resolves.toEqual(['23.235.32.0/20']);
    });

    it('keeps only IPv4 prefixes from the Google document', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(
                async () =>
                    new Response(
                        JSON.stringify({
                            syncToken: '1',
                            prefixes: [
                                { ipv4Prefix: '34.1.208.0/20', scope: 'africa-south1' },
                                { ipv6Prefix: '2600:1900:8000::/44', scope: 'africa-south1' },
                            ],
                        })
                    )
            )
        );

        await expect(sourceNamed('google').fetch()).resolves.toEqual(['34.1.208.0/20']);
    });

    it('reads the CloudFront global list', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(
                async () =>
                    new Response(
                        JSON.stringify({
                            CLOUDFRONT_GLOBAL_IP_LIST: ['120.52.22.96/27'],
                            CLOUDFRONT_REGIONAL_EDGE_IP_LIST: ['13.113.196.64/26'],
                        })
                    )
            )
        );

        await expect(sourceNamed('cloudfront').fetch()).resolves.toEqual(['120.52.22.96/27']);
    });

    it('splits the QUIC.cloud list on line breaks', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('192.0.2.10<br />192.0.2.11<br />')));

        await expect(sourceNamed('quic').fetch()).resolves.toEqual(['192.0.2.10', '192.0.2.11']);
    });

    it('scrapes the first code block of the Akamai page with a browser user agent', async () => {
        const fetchMock = vi.fn(
            async () =>
                new Response(
                    '<h2>Origin IPs</h2><pre><code class="rdmd-code lang-text theme-light">' +
                        '23.32.0.0/11\n23.192.0.0/11\n</code></pre>'
                )
        );
        vi.stubGlobal('fetch', fetchMock);

        await expect(sourceNamed('akamai').fetch()).resolves.toEqual(['23.32.0.0/11', '23.192.0.0/11']);
        expect(fetchMock).toHaveBeenCalledWith(
            'https://techdocs.akamai.com/origin-ip-acl/docs/update-your-origin-server',
            expect.objectContaining({
                headers: expect.objectContaining({
                    'User-Agent': expect.stringMatching(/^Mozilla\/5\.0/),
                }),
            })
        );
    });
});
