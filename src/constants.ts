import type { ListingStatus } from './types.js';

export const INPUT_DEFAULTS = {
    mode: 'run' as const,
    storeName: 'villages-snapshots',
    maxRejectPercent: 25,
    historyDays: 30,
    exportDays: 365,
};

export const SNAPSHOT_KEY_PREFIX = 'SNAPSHOT-';
export const OUTPUT_KEY = 'OUTPUT';
export const EXPORT_KEY = 'EXPORT';

export const CSV_HEADER = 'captured_at,total_active,total_pending,rejected,outcome';

/**
 * Every status string the listing site is known to show, lower-cased with single spaces.
 * Anything missing from here is rejected, never defaulted.
 */
export const STATUS_VOCABULARY: ReadonlyMap<string, ListingStatus> = new Map<string, ListingStatus>([
    ['active', 'active'],
    ['for sale', 'active'],
    ['available', 'active'],
    ['new listing', 'active'],
    ['price reduced', 'active'],
    ['pending', 'pending'],
    ['pending sale', 'pending'],
    ['sale pending', 'pending'],
    ['under contract', 'pending'],
    ['contingent', 'pending'],
]);

export const FETCH_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (compatible; VillagesListingTracker/1.0)',
    Accept: 'application/json',
};
