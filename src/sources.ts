import { Actor, log } from 'apify';
import { gotScraping } from 'crawlee';
import { z } from 'zod';

import { FETCH_HEADERS } from './constants.js';
import { FetchError } from './errors.js';
import type { FetchRawRows, Input, RawRow } from './types.js';

const feedSchema = z.union([z.array(z.unknown()), z.object({ listings: z.array(z.unknown()) })]);

/** The feed's items, all of them: malformed ones are left for the normalizer to reject and count. */
export const parseFeedBody = (body: unknown): unknown[] => {
    const parsed = feedSchema.safeParse(body);
    if (!parsed.success) {
        throw new FetchError('Feed body is neither an array of rows nor { listings: [...] }');
    }
    return Array.isArray(parsed.data) ? parsed.data : parsed.data.listings;
};

const fromInline =
    (rows: RawRow[]): FetchRawRows =>
    () =>
        rows;

const fromDataset =
    (datasetId: string): FetchRawRows =>
    async () => {
        const dataset = await Actor.openDataset(datasetId);
        const { items } = await dataset.getData();
        log.info(`[dataset] Read ${items.length} rows from dataset ${datasetId}`);
        return items;
    };

const fromFeed =
    (feedUrl: string): FetchRawRows =>
    async () => {
        const { body } = (await gotScraping({
            url: feedUrl,
            headers: FETCH_HEADERS,
            responseType: 'json',
        })) as { body: unknown };
        const rows = parseFeedBody(body);
        log.info(`[feed] Read ${rows.length} rows from ${feedUrl}`);
        return rows;
    };

/** Picks where this run's raw rows come from: inline input first, then a dataset, then a JSON feed. */
export const createFetchRawRows = (input: Pick<Input, 'rows' | 'sourceDatasetId' | 'feedUrl'>): FetchRawRows => {
    if (input.rows) return fromInline(input.rows);
    if (input.sourceDatasetId) return fromDataset(input.sourceDatasetId);
    if (input.feedUrl) return fromFeed(input.feedUrl);

    return () => {
        throw new FetchError('No listing source configured: provide rows, sourceDatasetId or feedUrl');
    };
};
