import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { LogEntry, LogLevel, LoggerTransport } from '../types.js';

const LEVEL_STYLES: Record<LogLevel, ChalkInstance> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.dim,
};

/**
 * One line per entry; warn and error on stderr, the rest on stdout
 */
export class ConsoleTransport implements LoggerTransport {
    constructor(private readonly colorize = true) {}

    write(entry: LogEntry): void {
        const line = this.format(entry);
        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    /** `HH:MM:SS LEVEL component: message {context}` with the time in UTC */
    format(entry: LogEntry): string {
        const head = `${entry.timestamp.slice(11, 19)} ${entry.level.toUpperCase().padEnd(5)} ${entry.component}: ${entry.message}`;
        const styled = this.colorize ? LEVEL_STYLES[entry.level](head) : head;
        if (!entry.context || Object.keys(entry.context).length === 0) {
            return styled;
        }
        return `${styled} ${JSON.stringify(entry.context)}`;
    }
}
