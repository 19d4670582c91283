import { log } from 'apify';

import { aggregate, countListingTypes } from './aggregator.js';
import type { RegionCatalog } from './catalog.js';
import { diffSnapshots } from './delta.js';
import { errorMessage, FetchError, StorageError } from './errors.js';
import { emptyRejectCounts, normalizeRows } from './normalizer.js';
import type { SnapshotStore } from './store.js';
import type {
    FetchRawRows,
    ListingTypeCounts,
    RejectReason,
    RunResult,
    RunStage,
    Snapshot,
    SnapshotDelta,
    StoredSnapshot,
} from './types.js';
import { ratio } from './utils.js';

const LOG_PREFIX = '[coordinator]';

export const DEFAULT_REJECT_THRESHOLD = 0.25;

export interface RunCoordinatorOptions {
    catalog: RegionCatalog;
    store: SnapshotStore;
    rejectThreshold?: number;
    now?: () => Date;
}

export type RunState = RunStage | { failed: RunStage };

interface RunProgress {
    rows: number;
    rejected: number;
    rejectsByReason: Record<RejectReason, number>;
    listingTypes: ListingTypeCounts;
    snapshot: Snapshot | null;
    previous: StoredSnapshot | null;
    delta: SnapshotDelta | null;
}

/**
 * Drives one ingestion: fetch → normalize → aggregate → diff → persist.
 * `runOnce` always resolves with a RunResult; failures are reported, never thrown.
 */
export class RunCoordinator {
    private readonly catalog: RegionCatalog;

    private readonly store: SnapshotStore;

    private readonly rejectThreshold: number;

    private readonly now: () => Date;

    private current: RunState = 'Done';

    private started = 0;

    constructor({
        catalog,
        store,
        rejectThreshold = DEFAULT_REJECT_THRESHOLD,
        now = () => new Date(),
    }: RunCoordinatorOptions) {
        this.catalog = catalog;
        this.store = store;
        this.rejectThreshold = rejectThreshold;
        this.now = now;
    }

    /** Stage of the most recently started run. */
    get state(): RunState {
        return this.current;
    }

    async runOnce(fetchRawRows: FetchRawRows): Promise<RunResult> {
        const startedAt = Date.now();
        this.started += 1;
        const run = this.started;
        const progress: RunProgress = {
            rows: 0,
            rejected: 0,
            rejectsByReason: emptyRejectCounts(),
            listingTypes: countListingTypes([]),
            snapshot: null,
            previous: null,
            delta: null,
        };

        let stage: RunStage = 'Fetching';
        const publish = (state: RunState): void => {
            if (run === this.started) this.current = state;
        };
        const enter = (next: RunStage): void => {
            stage = next;
            publish(next);
            log.debug(`${LOG_PREFIX} → ${next}`);
        };

        const fail = (failedStage: RunStage, error: unknown): RunResult => {
            publish({ failed: failedStage });
            log.error(`${LOG_PREFIX} Run failed while ${failedStage.toLowerCase()}: ${errorMessage(error)}`);
            return {
                ...progress,
                outcome: 'failed',
                failedStage,
                error: errorMessage(error),
                snapshotId: null,
                rejectRate: ratio(progress.rejected, progress.rows),
                durationMs: Date.now() - startedAt,
            };
        };

        enter('Fetching');
        let rows: unknown[];
        try {
            rows = await fetchRawRows();
        } catch (error) {
            return fail('Fetching', new FetchError(`Fetching listings failed: ${errorMessage(error)}`, { cause: error }));
        }
        if (rows.length === 0) {
            return fail('Fetching', new FetchError('Fetch returned no rows; nothing to snapshot'));
        }
        progress.rows = rows.length;

        let snapshot: Snapshot;
        try {
            enter('Normalizing');
            const { listings, rejected, rejectsByReason } = normalizeRows(rows, this.catalog);
            progress.rejected = rejected;
            progress.rejectsByReason = rejectsByReason;
            progress.listingTypes = countListingTypes(listings);
            log.info(`${LOG_PREFIX} Normalized ${rows.length} rows`, { accepted: listings.length, ...rejectsByReason });

            enter('Aggregating');
            snapshot = aggregate(this.catalog, listings, this.now(), rejected);
            progress.snapshot = snapshot;
        } catch (error) {
            return fail(stage, error);
        }

        try {
            enter('Diffing');
            progress.previous = await this.store.latest();
            progress.delta = diffSnapshots(progress.previous, snapshot);
        } catch (error) {
            return fail('Diffing', error);
        }

        // Rows dropped by the aggregator (villages missing from the catalog) count as rejected too.
        progress.rejected = snapshot.totals.rejected;
        const rejectRate = ratio(progress.rejected, progress.rows);
        const outcome = rejectRate > this.rejectThreshold ? 'partial' : 'success';
        if (outcome === 'partial') {
            log.warning(
                `${LOG_PREFIX} ${progress.rejected} of ${progress.rows} rows rejected (threshold ${this.rejectThreshold}); snapshot flagged as partial`,
            );
        }

        enter('Persisting');
        let snapshotId: string;
        try {
            snapshotId = await this.store.append(snapshot, outcome);
        } catch (error) {
            const storageError =
                error instanceof StorageError
                    ? error
                    : new StorageError(`Persisting snapshot failed: ${errorMessage(error)}`, { cause: error });
            return fail('Persisting', storageError);
        }

        enter('Done');
        log.info(`${LOG_PREFIX} Run finished`, {
            outcome,
            snapshotId,
            active: snapshot.totals.active,
            pending: snapshot.totals.pending,
            rejected: progress.rejected,
        });

        return {
            ...progress,
            outcome,
            failedStage: null,
            error: null,
            snapshotId,
            rejectRate,
            durationMs: Date.now() - startedAt,
        };
    }
}
