/**
 * @cdnscope/core
 *
 * Identify which CDN publishes the range containing an IP address.
 */

export { Cdnscope, createCdnscope } from './cdnscope.js';
export type { CdnscopeDeps, WarmReport } from './cdnscope.js';

export * from './cache/index.js';
export * from './config/index.js';
export * from './engine/index.js';
export * from './errors/index.js';
export * from './logger/index.js';
export * from './providers/index.js';
export * from './ranges/index.js';
