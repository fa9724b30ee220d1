export { LookupEngine, DEFAULT_PROVIDER_TIMEOUT_MS } from './lookup-engine.js';
export type { LookupEngineOptions, LookupMatch, ProviderFailure } from './lookup-engine.js';
