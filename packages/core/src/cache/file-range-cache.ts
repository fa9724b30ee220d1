import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { randomUUID } from 'crypto';
import type { Logger } from '../logger/types.js';
import { CdnscopeLogComponent } from '../logger/types.js';
import { errorMessage } from '../errors/CdnscopeRuntimeError.js';
import { CacheError } from './errors.js';
import { DEFAULT_CACHE_TTL_SECONDS } from './schemas.js';
import { createSnapshot, decodeSnapshot } from './snapshot.js';
import { systemClock } from './types.js';
import type { CacheReadResult, Clock, RangeCacheStore } from './types.js';

export interface FileRangeCacheOptions {
    provider: string;
    /** Defaults to the user's home directory */
    directory?: string;
    ttlSeconds?: number;
    clock?: Clock;
    logger?: Logger;
}

/**
 * File name for a provider's snapshot. Derived only from the provider name, so a provider
 * always finds its own snapshot and never collides with another's.
 */
export function snapshotFileName(provider: string): string {
    return `.${provider}.cdn.ip.range`;
}

/**
 * Stores one provider's snapshot as a pretty-printed JSON file.
 * Writes go to a temporary file that is renamed over the snapshot, so readers never see a
 * partial write.
 */
export class FileRangeCache implements RangeCacheStore {
    readonly location: string;
    private readonly provider: string;
    private readonly ttlSeconds: number;
    private readonly clock: Clock;
    private readonly logger: Logger | undefined;

    constructor(options: FileRangeCacheOptions) {
        this.provider = options.provider;
        this.location = path.join(options.directory ?? os.homedir(), snapshotFileName(options.provider));
        this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
        this.clock = options.clock ?? systemClock;
        this.logger = options.logger?.createChild(CdnscopeLogComponent.CACHE);
    }

    async read(): Promise<CacheReadResult> {
        let payload: string;
        try {
            payload = await fs.readFile(this.location, 'utf8');
        } catch (error: unknown) {
            const code = (error as NodeJS.ErrnoException).code;
            return {
                ok: false,
                reason: code === 'ENOENT' ? 'not_found' : 'corrupt',
                ranges: [],
                detail: errorMessage(error),
            };
        }

        return decodeSnapshot(payload, this.ttlSeconds, this.clock);
    }

    async write(ranges: readonly string[]): Promise<void> {
        const snapshot = createSnapshot(ranges, this.clock);
        const tempPath = `${this.location}.${process.pid}.${randomUUID()}.tmp`;

        try {
            await fs.mkdir(path.dirname(this.location), { recursive: true });
            await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 1), 'utf8');
            await fs.rename(tempPath, this.location);
        } catch (error) {
            await this.removeTempFile(tempPath);
            throw CacheError.writeFailed(this.provider, errorMessage(error), {
                path: this.location,
            });
        }

        this.logger?.debug(`Cached ${ranges.length} ranges for ${this.provider}`, {
            path: this.location,
            fetchedAt: snapshot.fetchedAt,
        });
    }

    private async removeTempFile(tempPath: string): Promise<void> {
        try {
            await fs.rm(tempPath, { force: true });
        } catch (error) {
            this.logger?.debug(`Could not remove ${tempPath}: ${errorMessage(error)}`);
        }
    }
}
