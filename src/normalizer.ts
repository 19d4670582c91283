import { z } from 'zod';

import type { RegionCatalog } from './catalog.js';
import { STATUS_VOCABULARY } from './constants.js';
import type { Listing, ListingStatus, ListingType, NormalizeResult, RawRow, RejectReason } from './types.js';
import { foldName } from './utils.js';

const SOURCE_ID_FIELDS = ['id', 'sourceId', 'listingId'] as const;

const rawRowSchema = z.record(z.unknown());

export const parseStatus = (value: unknown): ListingStatus | null => {
    if (typeof value !== 'string') return null;
    return STATUS_VOCABULARY.get(foldName(value)) ?? null;
};

export const parseSourceId = (row: RawRow): string | null => {
    for (const field of SOURCE_ID_FIELDS) {
        const value = row[field];
        if (typeof value === 'string' && value.trim()) return value.trim();
        if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    }
    return null;
};

const parseType = (value: unknown): ListingType | null => {
    if (typeof value !== 'string') return null;
    const folded = foldName(value);
    return folded === 'new' || folded === 'preowned' ? folded : null;
};

/**
 * Turns one scraped item into a Listing. Checks run in a fixed order (village text, status, catalog)
 * so a row with several problems always reports the same reason. An item that is not an object
 * has no village field at all and is rejected as EmptyVillage.
 */
export const normalizeRow = (item: unknown, catalog: RegionCatalog): NormalizeResult => {
    const parsed = rawRowSchema.safeParse(item);
    if (!parsed.success) return { ok: false, reason: 'EmptyVillage', row: item };

    const row: RawRow = parsed.data;
    const rawVillage = row.village;
    const village = typeof rawVillage === 'string' ? foldName(rawVillage) : '';
    if (!village) return { ok: false, reason: 'EmptyVillage', row };

    const status = parseStatus(row.status);
    if (!status) return { ok: false, reason: 'UnknownStatus', row };

    const entry = catalog.resolve(village);
    if (!entry) return { ok: false, reason: 'UnknownVillage', row };

    return {
        ok: true,
        listing: {
            village: entry.village,
            region: entry.region,
            status,
            sourceId: parseSourceId(row),
            type: parseType(row.type),
        },
    };
};

export interface NormalizedBatch {
    listings: Listing[];
    rejected: number;
    rejectsByReason: Record<RejectReason, number>;
}

export const emptyRejectCounts = (): Record<RejectReason, number> => ({
    EmptyVillage: 0,
    UnknownStatus: 0,
    UnknownVillage: 0,
});

export const normalizeRows = (rows: readonly unknown[], catalog: RegionCatalog): NormalizedBatch => {
    const listings: Listing[] = [];
    const rejectsByReason = emptyRejectCounts();
    let rejected = 0;

    for (const row of rows) {
        const result = normalizeRow(row, catalog);
        if (result.ok) {
            listings.push(result.listing);
        } else {
            rejectsByReason[result.reason] += 1;
            rejected += 1;
        }
    }

    return { listings, rejected, rejectsByReason };
};
