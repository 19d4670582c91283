import { log } from 'apify';

import type { RegionCatalog } from './catalog.js';
import type { Listing, ListingTypeCounts, RegionCounts, Snapshot, StatusCounts, VillageCounts } from './types.js';
import { compareNames, toIsoTimestamp } from './utils.js';

const LOG_PREFIX = '[aggregator]';

/**
 * Collapses listings that share a source id. The last one seen decides the status,
 * since the fetch side is allowed to return the same card twice.
 */
export const dedupeListings = (listings: readonly Listing[]): { unique: Listing[]; duplicates: number } => {
    const withoutId: Listing[] = [];
    const byId = new Map<string, Listing>();
    let duplicates = 0;

    for (const listing of listings) {
        if (listing.sourceId === null) {
            withoutId.push(listing);
            continue;
        }
        if (byId.has(listing.sourceId)) duplicates += 1;
        byId.set(listing.sourceId, listing);
    }

    return { unique: [...withoutId, ...byId.values()], duplicates };
};

/** New against pre-owned split of a batch. Informational only; snapshots do not carry it. */
export const countListingTypes = (listings: readonly Listing[]): ListingTypeCounts => {
    const counts: ListingTypeCounts = { new: 0, preowned: 0, unspecified: 0 };
    for (const listing of dedupeListings(listings).unique) {
        counts[listing.type ?? 'unspecified'] += 1;
    }
    return counts;
};

const withTotal = (active: number, pending: number): StatusCounts => ({ active, pending, total: active + pending });

export const aggregate = (
    catalog: RegionCatalog,
    listings: readonly Listing[],
    capturedAt: Date | string,
    rejected = 0,
): Snapshot => {
    // Shape comes from the catalog alone so that a village with no listings still shows up as zero.
    const cells = new Map<string, { region: string; active: number; pending: number }>();
    for (const { region, village } of catalog.allVillages()) {
        cells.set(village, { region, active: 0, pending: 0 });
    }

    const { unique, duplicates } = dedupeListings(listings);
    let unresolved = 0;

    for (const listing of unique) {
        const entry = catalog.resolve(listing.village);
        const cell = entry ? cells.get(entry.village) : undefined;
        if (!cell) {
            unresolved += 1;
            continue;
        }
        cell[listing.status] += 1;
    }

    if (unresolved > 0) {
        log.warning(`${LOG_PREFIX} ${unresolved} listings name villages outside the catalog; counted as rejected`);
    }

    const regionMap = new Map<string, VillageCounts[]>();
    for (const [name, cell] of cells) {
        const villages = regionMap.get(cell.region) ?? [];
        villages.push({ name, ...withTotal(cell.active, cell.pending) });
        regionMap.set(cell.region, villages);
    }

    const regions: RegionCounts[] = [...regionMap.entries()]
        .map(([name, villages]) => {
            const active = villages.reduce((sum, village) => sum + village.active, 0);
            const pending = villages.reduce((sum, village) => sum + village.pending, 0);
            return {
                name,
                ...withTotal(active, pending),
                villages: villages.sort((a, b) => compareNames(a.name, b.name)),
            };
        })
        .sort((a, b) => compareNames(a.name, b.name));

    const active = regions.reduce((sum, region) => sum + region.active, 0);
    const pending = regions.reduce((sum, region) => sum + region.pending, 0);
    const totalRejected = rejected + unresolved;

    return {
        capturedAt: toIsoTimestamp(capturedAt),
        regions,
        totals: {
            active,
            pending,
            rejected: totalRejected,
            duplicates,
            rows: active + pending + totalRejected + duplicates,
        },
    };
};

/** Canonical JSON for a snapshot: fixed key order, regions and villages alphabetical. */
export const serializeSnapshot = (snapshot: Snapshot): string => {
    const ordered: Snapshot = {
        capturedAt: snapshot.capturedAt,
        regions: [...snapshot.regions]
            .sort((a, b) => compareNames(a.name, b.name))
            .map((region) => ({
                name: region.name,
                active: region.active,
                pending: region.pending,
                total: region.total,
                villages: [...region.villages]
                    .sort((a, b) => compareNames(a.name, b.name))
                    .map(({ name, active, pending, total }) => ({ name, active, pending, total })),
            })),
        totals: {
            active: snapshot.totals.active,
            pending: snapshot.totals.pending,
            rejected: snapshot.totals.rejected,
            duplicates: snapshot.totals.duplicates,
            rows: snapshot.totals.rows,
        },
    };

    return JSON.stringify(ordered);
};

/** Key for a (region, village) pair; names may contain any character, so no plain separator. */
const placeKey = (region: string, village: string): string => JSON.stringify([region, village]);

/** Flattens a snapshot to (region, village) → counts, keyed by `placeKey`. */
export const villageCounts = (snapshot: Snapshot): Map<string, { region: string; village: string } & StatusCounts> =>
    new Map(
        snapshot.regions.flatMap((region) =>
            region.villages.map(
                (village) =>
                    [
                        placeKey(region.name, village.name),
                        {
                            region: region.name,
                            village: village.name,
                            active: village.active,
                            pending: village.pending,
                            total: village.total,
                        },
                    ] as const,
            ),
        ),
    );
