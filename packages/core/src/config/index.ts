export {
    applyOverrides,
    loadConfig,
    overridesFromEnv,
    readConfigFile,
    validateConfig,
    type ConfigOverrides,
    type LoadConfigOptions,
    type RawConfig,
} from './loader.js';
export {
    CdnscopeConfigSchema,
    LookupConfigSchema,
    type CdnscopeConfig,
    type CdnscopeConfigInput,
    type LookupConfig,
} from './schemas.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
