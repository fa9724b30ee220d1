import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import { ConfigError } from './errors.js';
import { CdnscopeConfigSchema } from './schemas.js';
import type { CdnscopeConfig } from './schemas.js';

export type RawConfig = Record<string, unknown>;

/**
 * Settings that can be layered over a config file
 */
export interface ConfigOverrides {
    /** Snapshot directory; implies the file cache */
    cacheDir?: string;
    logLevel?: string;
}

function isPlainObject(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a YAML configuration file without validating it.
 * An empty file yields an empty config.
 *
 * @throws {CdnscopeRuntimeError} config_file_not_found, config_file_read_error or config_parse_error
 */
export async function readConfigFile(configPath: string): Promise<RawConfig> {
    const absolutePath = path.resolve(configPath);

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            throw ConfigError.fileNotFound(absolutePath);
        }
        throw ConfigError.fileReadError(absolutePath, errorMessage(error));
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(absolutePath, errorMessage(error));
    }

    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (!isPlainObject(parsed)) {
        throw ConfigError.parseError(absolutePath, 'top level must be a mapping');
    }
    return parsed;
}

/**
 * CDNSCOPE_CACHE_DIR and CDNSCOPE_LOG_LEVEL
 */
export function overridesFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (env.CDNSCOPE_CACHE_DIR) {
        overrides.cacheDir = env.CDNSCOPE_CACHE_DIR;
    }
    if (env.CDNSCOPE_LOG_LEVEL) {
        overrides.logLevel = env.CDNSCOPE_LOG_LEVEL;
    }
    return overrides;
}

/**
 * Layers overrides over a raw config. The input is left untouched.
 */
export function applyOverrides(raw: RawConfig, overrides: ConfigOverrides): RawConfig {
    const result: RawConfig = { ...raw };

    if (overrides.cacheDir !== undefined) {
        const cache = isPlainObject(raw.cache) ? raw.cache : {};
        result.cache = { ...cache, type: 'file', directory: overrides.cacheDir };
    }

    if (overrides.logLevel !== undefined) {
        const logger = isPlainObject(raw.logger) ? raw.logger : {};
        result.logger = { ...logger, level: overrides.logLevel.toLowerCase() };
    }

    return result;
}

/**
 * @throws {CdnscopeValidationError} with one issue per invalid field
 */
export function validateConfig(raw: unknown): CdnscopeConfig {
    const result = CdnscopeConfigSchema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.invalid(result.error);
    }
    return result.data;
}

export interface LoadConfigOptions {
    /** YAML file to start from; defaults are used when omitted */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    /** Applied after the environment, e.g. CLI flags */
    overrides?: ConfigOverrides;
}

/**
 * File, then environment, then explicit overrides, then validation.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CdnscopeConfig> {
    let raw: RawConfig = options.configPath ? await readConfigFile(options.configPath) : {};
    raw = applyOverrides(raw, overridesFromEnv(options.env));
    if (options.overrides) {
        raw = applyOverrides(raw, options.overrides);
    }
    return validateConfig(raw);
}
