import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import { CdnscopeLogger } from './cdnscope-logger.js';
import { LoggerError } from './errors.js';
import type { LoggerConfig, LoggerTransportConfig } from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { CdnscopeLogComponent, LOG_LEVELS } from './types.js';
import type { LogLevel, Logger, LoggerTransport } from './types.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    /** Defaults to ENGINE */
    component?: CdnscopeLogComponent;
}

/**
 * @throws CdnscopeRuntimeError (logger_transport_initialization_failed) when a log file
 * cannot be opened
 */
export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'console':
            return new ConsoleTransport(config.colorize);
        case 'silent':
            return { write: () => {} };
        case 'file':
            try {
                return new FileTransport(config.path);
            } catch (error) {
                throw LoggerError.transportInitializationFailed('file', errorMessage(error), {
                    path: config.path,
                });
            }
    }
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ config: LoggerConfigSchema.parse({ level: 'debug' }) });
 * logger.debug('Cache warmed');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, component = CdnscopeLogComponent.ENGINE } = options;
    return new CdnscopeLogger(
        { level: config.level, transports: config.transports.map(createTransport) },
        component
    );
}

/**
 * Narrow a free-form string (CLI flag, env var) to a LogLevel
 * @throws CdnscopeRuntimeError (logger_invalid_log_level)
 */
export function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
    if (!level) {
        throw LoggerError.invalidLogLevel(value, LOG_LEVELS);
    }
    return level;
}
