import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { CatalogError } from './errors.js';
import { compareNames, foldName } from './utils.js';

const DEFAULT_CATALOG_URL = new URL('../data/regions.json', import.meta.url);

const catalogFileSchema = z.object({
    regions: z.record(z.array(z.string())),
    aliases: z.record(z.string()).default({}),
});

export interface CatalogEntry {
    region: string;
    village: string;
}

/**
 * Fixed village → region mapping. Many villages to one region; built once at startup
 * and handed to whoever needs it, never mutated.
 */
export class RegionCatalog {
    private readonly byKey: ReadonlyMap<string, CatalogEntry>;

    private readonly entries: readonly CatalogEntry[];

    private constructor(byKey: Map<string, CatalogEntry>, entries: CatalogEntry[]) {
        this.byKey = byKey;
        this.entries = entries;
    }

    static fromDefinitions(
        definitions: Record<string, readonly string[]>,
        aliases: Record<string, string> = {},
    ): RegionCatalog {
        const byKey = new Map<string, CatalogEntry>();
        const entries: CatalogEntry[] = [];

        for (const [rawRegion, villages] of Object.entries(definitions)) {
            const region = rawRegion.trim();
            if (!region) throw new CatalogError('Region name must not be empty');
            if (villages.length === 0) throw new CatalogError(`Region "${region}" has no villages`);

            for (const rawVillage of villages) {
                const village = rawVillage.trim();
                if (!village) throw new CatalogError(`Empty village name in region "${region}"`);

                const key = foldName(village);
                const existing = byKey.get(key);
                if (existing) {
                    throw new CatalogError(
                        `Village "${village}" is listed under both "${existing.region}" and "${region}"`,
                    );
                }

                const entry = { region, village };
                byKey.set(key, entry);
                entries.push(entry);
            }
        }

        for (const [alias, target] of Object.entries(aliases)) {
            const entry = byKey.get(foldName(target));
            if (!entry) throw new CatalogError(`Alias "${alias}" points at unknown village "${target}"`);

            const key = foldName(alias);
            const clash = byKey.get(key);
            if (clash && clash !== entry) {
                throw new CatalogError(`Alias "${alias}" collides with village "${clash.village}"`);
            }
            byKey.set(key, entry);
        }

        entries.sort((a, b) => compareNames(a.region, b.region) || compareNames(a.village, b.village));

        return new RegionCatalog(byKey, entries);
    }

    get size(): number {
        return this.entries.length;
    }

    /** Region for a village name (case-insensitive, whitespace-tolerant), or null when unknown. */
    regionOf(village: string): string | null {
        return this.resolve(village)?.region ?? null;
    }

    resolve(village: string): CatalogEntry | null {
        return this.byKey.get(foldName(village)) ?? null;
    }

    /** Every (region, village) pair, regions then villages in alphabetical order. */
    allVillages(): readonly CatalogEntry[] {
        return this.entries;
    }

    regions(): string[] {
        return [...new Set(this.entries.map((entry) => entry.region))];
    }
}

/** Reads a `{ regions, aliases }` catalog file; extra aliases are layered over the file's own. */
export const loadRegionCatalog = (
    path: string | URL = DEFAULT_CATALOG_URL,
    extraAliases: Record<string, string> = {},
): RegionCatalog => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new CatalogError(`Cannot read region catalog at ${String(path)}: ${String(error)}`);
    }

    const result = catalogFileSchema.safeParse(parsed);
    if (!result.success) {
        throw new CatalogError(`Malformed region catalog at ${String(path)}: ${result.error.message}`);
    }

    return RegionCatalog.fromDefinitions(result.data.regions, { ...result.data.aliases, ...extraAliases });
};
