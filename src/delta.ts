import { villageCounts } from './aggregator.js';
import type { RegionDelta, Snapshot, SnapshotDelta, VillageDelta } from './types.js';
import { compareNames } from './utils.js';

/**
 * Newest minus previous, per village and rolled up per region. A side that lacks a village counts as zero,
 * so villages that disappeared from the catalog show up as negative deltas rather than vanishing.
 */
export const diffSnapshots = (previous: Snapshot | null, next: Snapshot): SnapshotDelta => {
    const nextCounts = villageCounts(next);
    const previousCounts: ReturnType<typeof villageCounts> = previous ? villageCounts(previous) : new Map();
    const keys = new Set([...nextCounts.keys(), ...previousCounts.keys()]);

    const villages: VillageDelta[] = [];
    for (const key of keys) {
        const after = nextCounts.get(key);
        const before = previousCounts.get(key);
        const place = after ?? before;
        if (!place) continue;

        const active = (after?.active ?? 0) - (before?.active ?? 0);
        const pending = (after?.pending ?? 0) - (before?.pending ?? 0);
        villages.push({ region: place.region, village: place.village, active, pending, total: active + pending });
    }
    villages.sort((a, b) => compareNames(a.region, b.region) || compareNames(a.village, b.village));

    const byRegion = new Map<string, RegionDelta>();
    for (const village of villages) {
        const region = byRegion.get(village.region) ?? { region: village.region, active: 0, pending: 0, total: 0 };
        region.active += village.active;
        region.pending += village.pending;
        region.total += village.total;
        byRegion.set(village.region, region);
    }

    return {
        villages,
        regions: [...byRegion.values()],
        totals: {
            active: next.totals.active - (previous?.totals.active ?? 0),
            pending: next.totals.pending - (previous?.totals.pending ?? 0),
        },
        changed: villages.filter((village) => village.active !== 0 || village.pending !== 0),
    };
};
