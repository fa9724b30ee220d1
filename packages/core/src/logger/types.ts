/** Most severe first; a logger records its own level and everything above it */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Which part of cdnscope produced an entry
 */
export enum CdnscopeLogComponent {
    CACHE = 'cache',
    PROVIDER = 'provider',
    REGISTRY = 'registry',
    ENGINE = 'engine',
    CONFIG = 'config',
    CLI = 'cli',
}

export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO 8601 */
    timestamp: string;
    component: CdnscopeLogComponent;
    context?: Record<string, unknown>;
}

export type Logger = {
    error(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    debug(message: string, context?: Record<string, unknown>): void;
    /** Range dumps and per-entry chatter */
    silly(message: string, context?: Record<string, unknown>): void;

    /** Same transports and level, different component tag */
    createChild(component: CdnscopeLogComponent): Logger;

    /** Applies to this logger and every logger derived from it */
    setLevel(level: LogLevel): void;
    getLevel(): LogLevel;

    /** Flush and close transports */
    destroy(): Promise<void>;
};

export type LoggerTransport = {
    write(entry: LogEntry): void;
    close?(): Promise<void>;
};
