import { z } from 'zod';
import { LOG_LEVELS } from './types.js';

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    z
        .object({
            type: z.literal('console'),
            colorize: z.boolean().default(true),
        })
        .strict(),
    z
        .object({
            type: z.literal('file'),
            path: z.string().min(1).describe('Log file; one JSON object is appended per entry'),
        })
        .strict(),
    z.object({ type: z.literal('silent') }).strict(),
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z.enum(LOG_LEVELS).default('warn'),
        transports: z.array(LoggerTransportSchema).min(1).default([{ type: 'console' }]),
    })
    .strict()
    .describe('Where log entries go and how verbose they are');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
