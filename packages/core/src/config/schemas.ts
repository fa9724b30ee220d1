import { z } from 'zod';
import { RangeCacheConfigSchema } from '../cache/schemas.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../engine/lookup-engine.js';
import { LoggerConfigSchema } from '../logger/schemas.js';

/** Largest delay a Node timer accepts */
export const MAX_TIMER_MS = 2_147_483_647;

export const LookupConfigSchema = z
    .object({
        providerTimeoutMs: z
            .number()
            .int()
            .positive()
            .max(MAX_TIMER_MS)
            .default(DEFAULT_PROVIDER_TIMEOUT_MS)
            .describe('Upper bound for one provider fetch during a lookup'),
        queryTimeoutMs: z
            .number()
            .int()
            .positive()
            .max(MAX_TIMER_MS)
            .optional()
            .describe('Upper bound for a whole lookup'),
    })
    .strict();

export type LookupConfig = z.output<typeof LookupConfigSchema>;

export const CdnscopeConfigSchema = z
    .object({
        cache: RangeCacheConfigSchema.default({ type: 'file' }),
        lookup: LookupConfigSchema.default({}),
        providers: z
            .array(z.string().min(1))
            .min(1)
            .optional()
            .describe('Restrict lookups to these providers (default: every available source)'),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .describe('cdnscope configuration');

export type CdnscopeConfig = z.output<typeof CdnscopeConfigSchema>;
export type CdnscopeConfigInput = z.input<typeof CdnscopeConfigSchema>;
