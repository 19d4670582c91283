import { Actor, log } from 'apify';
import { v4 as uuidv4 } from 'uuid';

import { SNAPSHOT_KEY_PREFIX } from './constants.js';
import { errorMessage, StorageError } from './errors.js';
import type { PersistedOutcome, Snapshot, SnapshotSummary, StoredSnapshot } from './types.js';
import { toIsoTimestamp, utcDay } from './utils.js';

const LOG_PREFIX = '[store]';

const KEY_PATTERN = new RegExp(`^${SNAPSHOT_KEY_PREFIX}(\\d{4})(\\d{2})(\\d{2})T(\\d{2})(\\d{2})(\\d{2})(\\d{3})Z-[A-Za-z0-9-]+$`);

/** The slice of an Apify key-value store the snapshot store relies on. */
export interface RecordStore {
    getValue<T>(key: string): Promise<T | null>;
    setValue<T>(key: string, value: T | null, options?: { contentType?: string }): Promise<void>;
    forEachKey(iteratee: (key: string) => void): Promise<void>;
}

export interface SnapshotStore {
    append(snapshot: Snapshot, outcome?: PersistedOutcome): Promise<string>;
    latest(): Promise<StoredSnapshot | null>;
    latestN(count: number): Promise<StoredSnapshot[]>;
    before(timestamp: Date | string): Promise<StoredSnapshot | null>;
    range(from?: Date, to?: Date): Promise<StoredSnapshot[]>;
    onDate(day: string): Promise<StoredSnapshot | null>;
    summaries(limit?: number): Promise<SnapshotSummary[]>;
}

export interface KeyValueSnapshotStoreOptions {
    /** Makes a key unique among writers sharing the store. Defaults to a random UUID. */
    createSuffix?: () => string;
}

interface KeyEntry {
    id: string;
    capturedAt: number;
}

/** `SNAPSHOT-20260105T060000000Z-<suffix>`: keys sort by capture time, then by suffix. */
export const snapshotKey = (capturedAt: Date | string, suffix: string): string =>
    `${SNAPSHOT_KEY_PREFIX}${toIsoTimestamp(capturedAt).replace(/[-:.]/g, '')}-${suffix}`;

/** Capture time encoded in a snapshot key, or null for keys the store did not write. */
export const snapshotKeyTime = (key: string): number | null => {
    const match = KEY_PATTERN.exec(key);
    if (!match) return null;
    const [, year, month, day, hours, minutes, seconds, millis] = match;
    const time = Date.parse(`${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${millis}Z`);
    return Number.isNaN(time) ? null : time;
};

const byKey = (a: KeyEntry, b: KeyEntry): number => {
    if (a.capturedAt !== b.capturedAt) return a.capturedAt - b.capturedAt;
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
};

const toSummary = ({ id, capturedAt, outcome, totals }: StoredSnapshot): SnapshotSummary => ({
    id,
    capturedAt,
    outcome,
    totals,
});

/**
 * Append-only snapshot history. Every snapshot is one record under a key nobody else writes,
 * so an append is a single write and concurrent runs, in this process or another, never collide.
 * Readers discover snapshots by listing keys.
 */
export class KeyValueSnapshotStore implements SnapshotStore {
    private readonly createSuffix: () => string;

    constructor(
        private readonly records: RecordStore,
        { createSuffix = () => uuidv4() }: KeyValueSnapshotStoreOptions = {},
    ) {
        this.createSuffix = createSuffix;
    }

    static async open(storeName: string): Promise<KeyValueSnapshotStore> {
        return new KeyValueSnapshotStore(await Actor.openKeyValueStore(storeName));
    }

    async append(snapshot: Snapshot, outcome: PersistedOutcome = 'success'): Promise<string> {
        const id = snapshotKey(snapshot.capturedAt, this.createSuffix());
        const stored: StoredSnapshot = { ...snapshot, id, outcome };

        try {
            await this.records.setValue(id, stored);
        } catch (error) {
            throw new StorageError(`Failed to write snapshot ${id}: ${errorMessage(error)}`, { cause: error });
        }

        log.info(`${LOG_PREFIX} Stored snapshot ${id}`, { capturedAt: snapshot.capturedAt, outcome });
        return id;
    }

    async latest(): Promise<StoredSnapshot | null> {
        const [newest] = await this.latestN(1);
        return newest ?? null;
    }

    async latestN(count: number): Promise<StoredSnapshot[]> {
        const newestFirst = (await this.sortedKeys()).reverse().slice(0, Math.max(0, count));
        return this.loadAll(newestFirst);
    }

    async before(timestamp: Date | string): Promise<StoredSnapshot | null> {
        const cutoff = new Date(timestamp).getTime();
        const last = (await this.sortedKeys()).filter((entry) => entry.capturedAt < cutoff).at(-1);
        return last ? this.load(last.id) : null;
    }

    async range(from?: Date, to?: Date): Promise<StoredSnapshot[]> {
        const lower = from?.getTime() ?? -Infinity;
        const upper = to?.getTime() ?? Infinity;
        const entries = (await this.sortedKeys()).filter(
            (entry) => entry.capturedAt >= lower && entry.capturedAt <= upper,
        );
        return this.loadAll(entries);
    }

    /** The canonical snapshot of a UTC day (`YYYY-MM-DD`): the last one captured on it. */
    async onDate(day: string): Promise<StoredSnapshot | null> {
        const last = (await this.sortedKeys())
            .filter((entry) => utcDay(new Date(entry.capturedAt).toISOString()) === day)
            .at(-1);
        return last ? this.load(last.id) : null;
    }

    /** Newest first. */
    async summaries(limit?: number): Promise<SnapshotSummary[]> {
        const newestFirst = (await this.sortedKeys()).reverse();
        const picked = limit === undefined ? newestFirst : newestFirst.slice(0, Math.max(0, limit));
        return (await this.loadAll(picked)).map(toSummary);
    }

    private async sortedKeys(): Promise<KeyEntry[]> {
        const entries: KeyEntry[] = [];
        try {
            await this.records.forEachKey((key) => {
                const capturedAt = snapshotKeyTime(key);
                if (capturedAt !== null) entries.push({ id: key, capturedAt });
            });
        } catch (error) {
            throw new StorageError(`Failed to list snapshots: ${errorMessage(error)}`, { cause: error });
        }
        return entries.sort(byKey);
    }

    private loadAll(entries: readonly KeyEntry[]): Promise<StoredSnapshot[]> {
        return Promise.all(entries.map((entry) => this.load(entry.id)));
    }

    private async load(id: string): Promise<StoredSnapshot> {
        let stored: StoredSnapshot | null;
        try {
            stored = await this.records.getValue<StoredSnapshot>(id);
        } catch (error) {
            throw new StorageError(`Failed to read snapshot ${id}: ${errorMessage(error)}`, { cause: error });
        }
        if (!stored) throw new StorageError(`Snapshot ${id} is listed but missing`);
        return stored;
    }
}
