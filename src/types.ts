export type Mode = 'run' | 'latest' | 'range' | 'history' | 'export';
export type ListingStatus = 'active' | 'pending';
export type ListingType = 'new' | 'preowned';
export type RejectReason = 'EmptyVillage' | 'UnknownStatus' | 'UnknownVillage';
export type RunStage = 'Fetching' | 'Normalizing' | 'Aggregating' | 'Diffing' | 'Persisting' | 'Done';
export type RunOutcome = 'success' | 'partial' | 'failed';
export type PersistedOutcome = Exclude<RunOutcome, 'failed'>;

export interface Input {
    mode: Mode;
    rows?: RawRow[];
    sourceDatasetId?: string;
    feedUrl?: string;
    storeName: string;
    rejectThreshold: number; // fraction of rows; a run above it is flagged partial
    catalog?: Record<string, string[]>; // region → villages, overrides data/regions.json
    villageAliases?: Record<string, string>;
    from?: string;
    to?: string;
    days?: number;
}

/** A scraped row as the fetch side hands it over; nothing about it is trusted yet. */
export type RawRow = Record<string, unknown>;

/** Items as the source returned them; anything that is not a row is rejected during normalization. */
export type FetchRawRows = () => Promise<unknown[]> | unknown[];

export interface Listing {
    village: string; // catalog spelling
    region: string;
    status: ListingStatus;
    sourceId: string | null; // only used for within-run dedup
    type: ListingType | null;
}

export type NormalizeResult = { ok: true; listing: Listing } | { ok: false; reason: RejectReason; row: unknown };

/** Accepted listings by type after dedup; `unspecified` when the source gave none. */
export type ListingTypeCounts = Record<ListingType | 'unspecified', number>;

export interface StatusCounts {
    active: number;
    pending: number;
    total: number;
}

export interface VillageCounts extends StatusCounts {
    name: string;
}

export interface RegionCounts extends StatusCounts {
    name: string;
    villages: VillageCounts[];
}

export interface SnapshotTotals {
    active: number;
    pending: number;
    rejected: number;
    duplicates: number; // repeated source ids collapsed during dedup
    rows: number; // active + pending + rejected + duplicates
}

export interface Snapshot {
    capturedAt: string; // ISO, UTC
    regions: RegionCounts[];
    totals: SnapshotTotals;
}

export interface StoredSnapshot extends Snapshot {
    id: string;
    outcome: PersistedOutcome;
}

export interface SnapshotSummary {
    id: string;
    capturedAt: string;
    outcome: PersistedOutcome;
    totals: SnapshotTotals;
}

export interface CountDelta {
    active: number;
    pending: number;
    total: number;
}

export interface VillageDelta extends CountDelta {
    region: string;
    village: string;
}

export interface RegionDelta extends CountDelta {
    region: string;
}

export interface SnapshotDelta {
    villages: VillageDelta[];
    regions: RegionDelta[];
    totals: Omit<CountDelta, 'total'>;
    changed: VillageDelta[];
}

export interface RunResult {
    outcome: RunOutcome;
    failedStage: RunStage | null;
    error: string | null;
    snapshotId: string | null;
    snapshot: Snapshot | null;
    previous: StoredSnapshot | null;
    delta: SnapshotDelta | null;
    rows: number;
    rejected: number;
    rejectsByReason: Record<RejectReason, number>;
    listingTypes: ListingTypeCounts;
    rejectRate: number;
    durationMs: number;
}
