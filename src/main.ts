import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { loadRegionCatalog, RegionCatalog } from './catalog.js';
import { resolveInput } from './config.js';
import { EXPORT_KEY, INPUT_DEFAULTS, OUTPUT_KEY } from './constants.js';
import { RunCoordinator } from './coordinator.js';
import { errorMessage } from './errors.js';
import { historyView, latestView, rangeView, runSummary, toCsv } from './queries.js';
import { createFetchRawRows } from './sources.js';
import { KeyValueSnapshotStore } from './store.js';
import type { Input } from './types.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

const buildCatalog = (input: Input): RegionCatalog =>
    input.catalog
        ? RegionCatalog.fromDefinitions(input.catalog, input.villageAliases)
        : loadRegionCatalog(undefined, input.villageAliases);

const trigger = async (input: Input): Promise<string> => {
    const store = await KeyValueSnapshotStore.open(input.storeName);

    switch (input.mode) {
        case 'run': {
            const catalog = buildCatalog(input);
            log.info(`Catalog loaded: ${catalog.size} villages in ${catalog.regions().length} regions`);

            const coordinator = new RunCoordinator({ catalog, store, rejectThreshold: input.rejectThreshold });
            const result = await coordinator.runOnce(createFetchRawRows(input));
            const summary = runSummary(result);
            await Actor.setValue(OUTPUT_KEY, summary);
            await Actor.pushData(summary);

            if (result.outcome === 'failed') {
                throw new Error(`Run failed at ${result.failedStage ?? 'unknown stage'}: ${result.error ?? ''}`);
            }
            if (result.outcome === 'partial') {
                return `Snapshot ${result.snapshotId} stored as partial: ${result.rejected} of ${result.rows} rows rejected`;
            }
            return `Snapshot ${result.snapshotId} stored: ${summary.totals?.active ?? 0} active, ${summary.totals?.pending ?? 0} pending`;
        }
        case 'latest': {
            const view = await latestView(store);
            await Actor.setValue(OUTPUT_KEY, view);
            if (view) await Actor.pushData(view);
            return view ? `Latest snapshot captured at ${view.capturedAt}` : 'No snapshots stored yet';
        }
        case 'range': {
            const views = await rangeView(store, input.from, input.to);
            await Actor.setValue(OUTPUT_KEY, views);
            await Actor.pushData(views);
            return `${views.length} snapshots in range`;
        }
        case 'history': {
            const points = await historyView(store, input.days ?? INPUT_DEFAULTS.historyDays);
            await Actor.setValue(OUTPUT_KEY, { data: points });
            await Actor.pushData(points);
            return `${points.length} history points`;
        }
        case 'export': {
            const points = await historyView(store, input.days ?? INPUT_DEFAULTS.exportDays);
            await Actor.setValue(EXPORT_KEY, toCsv(points), { contentType: 'text/csv' });
            return `Exported ${points.length} rows to ${EXPORT_KEY}`;
        }
        default: {
            const unknownMode: never = input.mode;
            throw new Error(`Unsupported mode: ${String(unknownMode)}`);
        }
    }
};

try {
    const input = resolveInput(await Actor.getInput());
    log.info('Starting Villages Listing Tracker', {
        mode: input.mode,
        storeName: input.storeName,
        rejectThreshold: input.rejectThreshold,
    });

    const statusMessage = await trigger(input);
    log.info(`Done. ${statusMessage}`);
    await Actor.exit(statusMessage);
} catch (error) {
    log.exception(error instanceof Error ? error : new Error(errorMessage(error)), 'Tracker failed');
    await Actor.fail(errorMessage(error));
}
