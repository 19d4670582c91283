import { log } from 'apify';
import { vi } from 'vitest';

import { RegionCatalog } from '../../catalog.js';
import type { Listing } from '../../types.js';

export const catalog = RegionCatalog.fromDefinitions({
    North: ['Lakeview', 'Oakwood'],
    South: ['Brownwood'],
});

export const listing = (overrides: Partial<Listing> = {}): Listing => ({
    village: 'Lakeview',
    region: 'North',
    status: 'active',
    sourceId: null,
    type: null,
    ...overrides,
});

/** Deterministic key suffixes (`0001`, `0002`, ...) in place of random ones. */
export const sequentialSuffixes = (): (() => string) => {
    let next = 0;
    return () => {
        next += 1;
        return String(next).padStart(4, '0');
    };
};

export const silenceLog = (): void => {
    vi.spyOn(log, 'debug').mockReturnValue(undefined);
    vi.spyOn(log, 'info').mockReturnValue(undefined);
    vi.spyOn(log, 'warning').mockReturnValue(undefined);
    vi.spyOn(log, 'error').mockReturnValue(undefined);
};
