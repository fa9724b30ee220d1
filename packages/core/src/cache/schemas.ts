import { z } from 'zod';

export const CACHE_TYPES = ['file', 'in-memory'] as const;
export type CacheType = (typeof CACHE_TYPES)[number];

/** Seven days: past this age a snapshot is not trusted */
export const DEFAULT_CACHE_TTL_SECONDS = 7 * 24 * 60 * 60;

/**
 * Persisted range snapshot, one per provider
 */
export const CacheSnapshotSchema = z
    .object({
        fetchedAt: z.number().int().nonnegative().describe('Seconds since epoch'),
        ranges: z.array(z.string()),
    })
    .strict();

export type CacheSnapshot = z.output<typeof CacheSnapshotSchema>;

const BaseRangeCacheSchema = z.object({
    ttlSeconds: z
        .number()
        .int()
        .positive()
        .default(DEFAULT_CACHE_TTL_SECONDS)
        .describe('Maximum snapshot age in seconds (default: 7 days)'),
});

export const FileRangeCacheSchema = BaseRangeCacheSchema.extend({
    type: z.literal('file'),
    directory: z
        .string()
        .min(1)
        .optional()
        .describe('Directory holding one snapshot file per provider (default: home directory)'),
}).strict();

export type FileRangeCacheConfig = z.output<typeof FileRangeCacheSchema>;

export const InMemoryRangeCacheSchema = BaseRangeCacheSchema.extend({
    type: z.literal('in-memory'),
}).strict();

export type InMemoryRangeCacheConfig = z.output<typeof InMemoryRangeCacheSchema>;

export const RangeCacheConfigSchema = z
    .discriminatedUnion('type', [FileRangeCacheSchema, InMemoryRangeCacheSchema], {
        errorMap: (issue, ctx) => {
            if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
                return {
                    message: `Invalid cache type. Expected ${CACHE_TYPES.map((t) => `'${t}'`).join(' or ')}.`,
                };
            }
            return { message: ctx.defaultError };
        },
    })
    .describe('Range cache configuration');

export type RangeCacheConfig = z.output<typeof RangeCacheConfigSchema>;
export type RangeCacheConfigInput = z.input<typeof RangeCacheConfigSchema>;
