export { handleLookupCommand, type LookupCommandOptions } from './lookup.js';
export { handleFetchCommand } from './fetch.js';
export { handleWarmCommand } from './warm.js';
export { handleProvidersCommand } from './providers.js';
export { consoleOutput, type CommandOutput } from './output.js';
