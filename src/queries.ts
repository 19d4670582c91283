import { CSV_HEADER } from './constants.js';
import type { SnapshotStore } from './store.js';
import type {
    PersistedOutcome,
    RegionCounts,
    RunResult,
    SnapshotSummary,
    SnapshotTotals,
    StatusCounts,
    StoredSnapshot,
} from './types.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export interface SnapshotView {
    id: string;
    capturedAt: string;
    outcome: PersistedOutcome;
    totals: SnapshotTotals;
    regions: RegionCounts[];
    grouped: Record<string, Record<string, StatusCounts>>; // region → village → counts
}

export interface HistoryPoint {
    capturedAt: string;
    active: number;
    pending: number;
    rejected: number;
    outcome: PersistedOutcome;
}

/** A bare `YYYY-MM-DD` covers the whole UTC day: its start for `from`, its last millisecond for `to`. */
export const parseRangeBound = (value: string | undefined, edge: 'start' | 'end'): Date | undefined => {
    if (value === undefined) return undefined;
    if (DATE_ONLY.test(value)) {
        return new Date(edge === 'start' ? `${value}T00:00:00.000Z` : `${value}T23:59:59.999Z`);
    }
    return new Date(value);
};

export const toSnapshotView = (snapshot: StoredSnapshot): SnapshotView => ({
    id: snapshot.id,
    capturedAt: snapshot.capturedAt,
    outcome: snapshot.outcome,
    totals: snapshot.totals,
    regions: snapshot.regions,
    grouped: Object.fromEntries(
        snapshot.regions.map((region) => [
            region.name,
            Object.fromEntries(
                region.villages.map(({ name, active, pending, total }) => [name, { active, pending, total }]),
            ),
        ]),
    ),
});

export const latestView = async (store: SnapshotStore): Promise<SnapshotView | null> => {
    const latest = await store.latest();
    return latest ? toSnapshotView(latest) : null;
};

export const rangeView = async (store: SnapshotStore, from?: string, to?: string): Promise<SnapshotView[]> => {
    const snapshots = await store.range(parseRangeBound(from, 'start'), parseRangeBound(to, 'end'));
    return snapshots.map(toSnapshotView);
};

const toHistoryPoint = ({ capturedAt, totals, outcome }: SnapshotSummary): HistoryPoint => ({
    capturedAt,
    active: totals.active,
    pending: totals.pending,
    rejected: totals.rejected,
    outcome,
});

/** Newest first, at most `days` points. */
export const historyView = async (store: SnapshotStore, days: number): Promise<HistoryPoint[]> =>
    (await store.summaries(days)).map(toHistoryPoint);

export const toCsv = (points: readonly HistoryPoint[]): string =>
    [
        CSV_HEADER,
        ...points.map((point) =>
            [point.capturedAt, point.active, point.pending, point.rejected, point.outcome].join(','),
        ),
    ].join('\n') + '\n';

/** What a trigger hands back to the dashboard after a run. */
export const runSummary = (result: RunResult) => ({
    outcome: result.outcome,
    failedStage: result.failedStage,
    error: result.error,
    snapshotId: result.snapshotId,
    capturedAt: result.snapshot?.capturedAt ?? null,
    totals: result.snapshot?.totals ?? null,
    rows: result.rows,
    rejected: result.rejected,
    rejectsByReason: result.rejectsByReason,
    listingTypes: result.listingTypes,
    rejectRate: result.rejectRate,
    previousSnapshotId: result.previous?.id ?? null,
    delta: result.delta
        ? { totals: result.delta.totals, regions: result.delta.regions, changed: result.delta.changed }
        : null,
    durationMs: result.durationMs,
});
