import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
    applyOverrides,
    loadConfig,
    overridesFromEnv,
    readConfigFile,
    validateConfig,
} from './loader.js';
import { ConfigErrorCode } from './error-codes.js';
import { CdnscopeValidationError } from '../errors/CdnscopeValidationError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { DEFAULT_CACHE_TTL_SECONDS } from '../cache/schemas.js';

describe('config loader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdnscope-config-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    async function writeConfig(content: string): Promise<string> {
        const file = path.join(dir, 'cdnscope.yml');
        await fs.writeFile(file, content, 'utf8');
        return file;
    }

    describe('readConfigFile', () => {
        it('parses a YAML mapping', async () => {
            const file = await writeConfig('cache:\n  type: in-memory\nproviders: [fastly, bunny]\n');
            await expect(readConfigFile(file)).resolves.toEqual({
                cache: { type: 'in-memory' },
                providers: ['fastly', 'bunny'],
            });
        });

        it('treats an empty file as an empty config', async () => {
            const file = await writeConfig('');
            await expect(readConfigFile(file)).resolves.toEqual({});
        });

        it('throws config_file_not_found for a missing file', async () => {
            await expect(readConfigFile(path.join(dir, 'missing.yml'))).rejects.toMatchObject({
                code: ConfigErrorCode.FILE_NOT_FOUND,
                scope: ErrorScope.CONFIG,
                type: ErrorType.NOT_FOUND,
            });
        });

        it('throws config_file_read_error when the path is a directory', async () => {
            await expect(readConfigFile(dir)).rejects.toMatchObject({
                code: ConfigErrorCode.FILE_READ_ERROR,
                type: ErrorType.SYSTEM,
            });
        });

        it('throws config_parse_error for invalid YAML', async () => {
            const file = await writeConfig('cache: [unclosed\n');
            await expect(readConfigFile(file)).rejects.toMatchObject({
                code: ConfigErrorCode.PARSE_ERROR,
                type: ErrorType.USER,
            });
        });

        it('rejects a document that is not a mapping', async () => {
            const file = await writeConfig('- fastly\n- bunny\n');
            await expect(readConfigFile(file)).rejects.toMatchObject({
                code: ConfigErrorCode.PARSE_ERROR,
                context: { reason: 'top level must be a mapping' },
            });
        });
    });

    describe('validateConfig', () => {
        it('fills in defaults', () => {
            expect(validateConfig({})).toEqual({
                cache: { type: 'file', ttlSeconds: DEFAULT_CACHE_TTL_SECONDS },
                lookup: { providerTimeoutMs: 10_000 },
                logger: { level: 'warn', transports: [{ type: 'console', colorize: true }] },
            });
        });

        it('reports each invalid field with its path', () => {
            let caught: unknown;
            try {
                validateConfig({ cache: { type: 'file', ttlSeconds: -1 }, lookup: { extra: true } });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(CdnscopeValidationError);
            if (!(caught instanceof CdnscopeValidationError)) return;
            expect(caught.errors.map((issue) => issue.path?.join('.'))).toEqual([
                'cache.ttlSeconds',
                'lookup',
            ]);
            expect(caught.errors.every((issue) => issue.code === ConfigErrorCode.INVALID)).toBe(true);
        });

        it('rejects an unknown cache type with a readable message', () => {
            expect(() => validateConfig({ cache: { type: 'redis' } })).toThrow(
                "cache.type: Invalid cache type. Expected 'file' or 'in-memory'."
            );
        });

        it('rejects timeouts a timer cannot hold', () => {
            let caught: unknown;
            try {
                validateConfig({
                    lookup: { providerTimeoutMs: 3_000_000_000, queryTimeoutMs: 3_000_000_000 },
                });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(CdnscopeValidationError);
            if (!(caught instanceof CdnscopeValidationError)) return;
            expect(caught.errors.map((issue) => issue.path?.join('.'))).toEqual([
                'lookup.providerTimeoutMs',
                'lookup.queryTimeoutMs',
            ]);
        });

        it('accepts the largest timer delay', () => {
            expect(validateConfig({ lookup: { providerTimeoutMs: 2_147_483_647 } }).lookup).toEqual({
                providerTimeoutMs: 2_147_483_647,
            });
        });

        it('rejects an empty provider list', () => {
            expect(() => validateConfig({ providers: [] })).toThrow(CdnscopeValidationError);
        });
    });

    describe('overrides', () => {
        it('reads overrides from the environment', () => {
            expect(
                overridesFromEnv({ CDNSCOPE_CACHE_DIR: '/tmp/ranges', CDNSCOPE_LOG_LEVEL: 'DEBUG' })
            ).toEqual({ cacheDir: '/tmp/ranges', logLevel: 'DEBUG' });
            expect(overridesFromEnv({})).toEqual({});
        });

        it('forces the file cache when a directory is given', () => {
            const raw = { cache: { type: 'in-memory', ttlSeconds: 60 } };
            expect(applyOverrides(raw, { cacheDir: '/tmp/ranges' })).toEqual({
                cache: { type: 'file', ttlSeconds: 60, directory: '/tmp/ranges' },
            });
            expect(raw).toEqual({ cache: { type: 'in-memory', ttlSeconds: 60 } });
        });

        it('lower-cases the log level', () => {
            expect(applyOverrides({}, { logLevel: 'INFO' })).toEqual({ logger: { level: 'info' } });
        });
    });

    describe('loadConfig', () => {
        it('layers file, environment and explicit overrides', async () => {
            const file = await writeConfig(
                'cache:\n  type: file\n  directory: /from/file\nlogger:\n  level: error\n'
            );

            const config = await loadConfig({
                configPath: file,
                env: { CDNSCOPE_CACHE_DIR: '/from/env', CDNSCOPE_LOG_LEVEL: 'info' },
                overrides: { logLevel: 'debug' },
            });

            expect(config.cache).toEqual({
                type: 'file',
                directory: '/from/env',
                ttlSeconds: DEFAULT_CACHE_TTL_SECONDS,
            });
            expect(config.logger.level).toBe('debug');
        });

        it('uses defaults without a file', async () => {
            const config = await loadConfig({ env: {} });
            expect(config.cache).toEqual({ type: 'file', ttlSeconds: DEFAULT_CACHE_TTL_SECONDS });
            expect(config.providers).toBeUndefined();
        });
    });
});
