import { CacheSnapshotSchema } from './schemas.js';
import type { CacheSnapshot } from './schemas.js';
import type { CacheReadResult, Clock } from './types.js';

export function toEpochSeconds(ms: number): number {
    return Math.floor(ms / 1000);
}

export function createSnapshot(ranges: readonly string[], clock: Clock): CacheSnapshot {
    return { fetchedAt: toEpochSeconds(clock()), ranges: [...ranges] };
}

/**
 * Applies the freshness window: a snapshot is stale once it is more than ttlSeconds old.
 */
export function checkFreshness(
    snapshot: CacheSnapshot,
    ttlSeconds: number,
    clock: Clock
): CacheReadResult {
    const age = toEpochSeconds(clock()) - snapshot.fetchedAt;
    if (age > ttlSeconds) {
        return {
            ok: false,
            reason: 'stale',
            ranges: snapshot.ranges,
            detail: `snapshot is ${age}s old (limit ${ttlSeconds}s)`,
        };
    }
    return { ok: true, ranges: snapshot.ranges, fetchedAt: snapshot.fetchedAt };
}

/**
 * Decodes a persisted payload. Anything undecodable is reported as corrupt, keeping any
 * string entries that could still be recovered.
 */
export function decodeSnapshot(
    payload: string,
    ttlSeconds: number,
    clock: Clock
): CacheReadResult {
    let raw: unknown;
    try {
        raw = JSON.parse(payload);
    } catch (error) {
        return {
            ok: false,
            reason: 'corrupt',
            ranges: [],
            detail: error instanceof Error ? error.message : String(error),
        };
    }

    const parsed = CacheSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ok: false,
            reason: 'corrupt',
            ranges: recoverRanges(raw),
            detail: parsed.error.issues.map((issue) => issue.message).join('; '),
        };
    }

    return checkFreshness(parsed.data, ttlSeconds, clock);
}

function recoverRanges(raw: unknown): string[] {
    if (typeof raw !== 'object' || raw === null || !('ranges' in raw)) {
        return [];
    }
    const ranges: unknown = raw.ranges;
    if (!Array.isArray(ranges)) {
        return [];
    }
    return ranges.filter((entry): entry is string => typeof entry === 'string');
}
