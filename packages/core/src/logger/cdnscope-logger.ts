import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import type { CdnscopeLogComponent, LogEntry, LogLevel, Logger, LoggerTransport } from './types.js';

const SEVERITY: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    silly: 4,
};

/**
 * Shared by a logger and all of its children
 */
export interface LoggerState {
    level: LogLevel;
    transports: readonly LoggerTransport[];
}

/**
 * Tags entries with a component and hands them to every transport.
 * A transport that throws is reported on stderr and the remaining transports still run.
 */
export class CdnscopeLogger implements Logger {
    constructor(
        private readonly state: LoggerState,
        private readonly component: CdnscopeLogComponent
    ) {}

    error(message: string, context?: Record<string, unknown>): void {
        this.emit('error', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.emit('warn', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.emit('info', message, context);
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.emit('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.emit('silly', message, context);
    }

    createChild(component: CdnscopeLogComponent): CdnscopeLogger {
        return new CdnscopeLogger(this.state, component);
    }

    setLevel(level: LogLevel): void {
        this.state.level = level;
    }

    getLevel(): LogLevel {
        return this.state.level;
    }

    async destroy(): Promise<void> {
        await Promise.all(this.state.transports.map((transport) => transport.close?.()));
    }

    private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (SEVERITY[level] > SEVERITY[this.state.level]) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            ...(context !== undefined && { context }),
        };
        for (const transport of this.state.transports) {
            try {
                transport.write(entry);
            } catch (error) {
                console.error(`Log transport failed: ${errorMessage(error)}`);
            }
        }
    }
}
