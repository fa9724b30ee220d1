export { createLogger, createTransport, parseLogLevel } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { CdnscopeLogger } from './cdnscope-logger.js';
export type { LoggerState } from './cdnscope-logger.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export * from './types.js';
export * from './schemas.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
