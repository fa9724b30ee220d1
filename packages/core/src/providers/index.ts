export { ProviderRegistry } from './registry.js';
export { CachedRangeSource } from './cached-source.js';
export type { CachedRangeSourceOptions } from './cached-source.js';
export {
    BUILTIN_PROVIDER_NAMES,
    createBuiltinSources,
    isBuiltinProviderName,
    type BuiltinProviderName,
} from './builtin.js';
export { HttpRangeSource, DEFAULT_USER_AGENT } from './sources/http-range-source.js';
export type { HttpRangeSourceOptions } from './sources/http-range-source.js';
export { TextRangeSource } from './sources/text-range-source.js';
export type { TextRangeSourceOptions } from './sources/text-range-source.js';
export { JsonRangeSource } from './sources/json-range-source.js';
export type { JsonRangeSourceOptions } from './sources/json-range-source.js';
export {
    PatternRangeSource,
    IPV4_RANGE_PATTERN,
    extractTokens,
} from './sources/pattern-range-source.js';
export type { PatternRangeSourceOptions } from './sources/pattern-range-source.js';
export type { RangeFetchOptions, RangeProvider, RangeSource } from './types.js';
export { ProviderError } from './errors.js';
export { ProviderErrorCode } from './error-codes.js';
