import { createWriteStream, mkdirSync } from 'fs';
import type { WriteStream } from 'fs';
import path from 'path';
import type { LogEntry, LoggerTransport } from '../types.js';

/**
 * Appends one JSON object per entry to a log file, creating its directory if needed
 */
export class FileTransport implements LoggerTransport {
    private readonly stream: WriteStream;

    constructor(readonly filePath: string) {
        mkdirSync(path.dirname(filePath), { recursive: true });
        this.stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
        this.stream.on('error', (error) => {
            console.error(`Cannot write log file ${filePath}:`, error);
        });
    }

    write(entry: LogEntry): void {
        this.stream.write(`${JSON.stringify(entry)}\n`);
    }

    close(): Promise<void> {
        return new Promise<void>((resolve) => {
            this.stream.end(() => resolve());
        });
    }
}
