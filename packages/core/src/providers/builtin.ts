import { z } from 'zod';
import { JsonRangeSource } from './sources/json-range-source.js';
import { PatternRangeSource } from './sources/pattern-range-source.js';
import { TextRangeSource } from './sources/text-range-source.js';
import type { RangeSource } from './types.js';

export const BUILTIN_PROVIDER_NAMES = [
    'akamai',
    'bunny',
    'cachefly',
    'cloudflare',
    'cloudfront',
    'fastly',
    'gcore',
    'google',
    'key',
    'quic',
] as const;

export type BuiltinProviderName = (typeof BUILTIN_PROVIDER_NAMES)[number];

// The Akamai docs site rejects non-browser user agents
const BROWSER_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/58.0.3029.110 Safari/537.3';

const AddressListSchema = z.object({ addresses: z.array(z.string()) });

const BUILTIN_FACTORIES: Record<BuiltinProviderName, () => RangeSource> = {
    akamai: () =>
        new PatternRangeSource({
            name: 'akamai',
            url: 'https://techdocs.akamai.com/origin-ip-acl/docs/update-your-origin-server',
            headers: { 'User-Agent': BROWSER_USER_AGENT },
            section: /<code[^>]*class="[^"]*rdmd-code[^"]*"[^>]*>([\s\S]*?)<\/code>/,
        }),
    bunny: () =>
        new TextRangeSource({
            name: 'bunny',
            url: 'https://api.bunny.net/system/edgeserverlist/plain',
        }),
    cachefly: () =>
        new TextRangeSource({
            name: 'cachefly',
            url: 'https://cachefly.cachefly.net/ips/cdn.txt',
        }),
    cloudflare: () =>
        new TextRangeSource({
            name: 'cloudflare',
            url: 'https://www.cloudflare.com/ips-v4',
        }),
    cloudfront: () =>
        new JsonRangeSource({
            name: 'cloudfront',
            url: 'https://d7uri8nf7uskq.cloudfront.net/tools/list-cloudfront-ips',
            schema: z.object({ CLOUDFRONT_GLOBAL_IP_LIST: z.array(z.string()) }),
            select: (payload) => payload.CLOUDFRONT_GLOBAL_IP_LIST,
        }),
    fastly: () =>
        new JsonRangeSource({
            name: 'fastly',
            url: 'https://api.fastly.com/public-ip-list',
            schema: AddressListSchema,
            select: (payload) => payload.addresses,
        }),
    gcore: () =>
        new JsonRangeSource({
            name: 'gcore',
            url: 'https://api.gcore.com/cdn/public-ip-list',
            schema: AddressListSchema,
            select: (payload) => payload.addresses,
        }),
    google: () =>
        new JsonRangeSource({
            name: 'google',
            url: 'https://www.gstatic.com/ipranges/cloud.json',
            schema: z.object({
                prefixes: z.array(z.object({ ipv4Prefix: z.string().optional() })),
            }),
            select: (payload) => payload.prefixes.map((prefix) => prefix.ipv4Prefix),
        }),
    key: () =>
        new JsonRangeSource({
            name: 'key',
            url: 'https://www.keycdn.com/shield-prefixes.json',
            schema: z.object({ prefixes: z.array(z.string()) }),
            select: (payload) => payload.prefixes,
        }),
    quic: () =>
        new TextRangeSource({
            name: 'quic',
            url: 'https://quic.cloud/ips',
            separator: '<br />',
        }),
};

export function isBuiltinProviderName(name: string): name is BuiltinProviderName {
    return BUILTIN_PROVIDER_NAMES.some((builtin) => builtin === name);
}

/**
 * Adapters for every built-in provider, or only the named ones, in list order
 */
export function createBuiltinSources(
    names: readonly BuiltinProviderName[] = BUILTIN_PROVIDER_NAMES
): RangeSource[] {
    return names.map((name) => BUILTIN_FACTORIES[name]());
}
