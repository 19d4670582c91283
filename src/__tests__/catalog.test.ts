import { describe, expect, it } from 'vitest';

import { loadRegionCatalog, RegionCatalog } from '../catalog.js';
import { CatalogError } from '../errors.js';
import { catalog } from './helpers/fixtures.js';

describe('RegionCatalog', () => {
    it('should resolve villages case-insensitively with surrounding whitespace', () => {
        expect(catalog.regionOf('Lakeview')).toBe('North');
        expect(catalog.regionOf('  LAKEVIEW ')).toBe('North');
        expect(catalog.regionOf('brownwood')).toBe('South');
    });

    it('should return null for an unknown village', () => {
        expect(catalog.regionOf('Nowhere')).toBeNull();
        expect(catalog.resolve('')).toBeNull();
    });

    it('should return the catalog spelling from resolve', () => {
        expect(catalog.resolve('oakWOOD')).toEqual({ region: 'North', village: 'Oakwood' });
    });

    it('should list every village sorted by region then village', () => {
        const unsorted = RegionCatalog.fromDefinitions({ South: ['Brownwood'], North: ['Oakwood', 'Lakeview'] });

        expect(unsorted.allVillages()).toEqual([
            { region: 'North', village: 'Lakeview' },
            { region: 'North', village: 'Oakwood' },
            { region: 'South', village: 'Brownwood' },
        ]);
        expect(unsorted.regions()).toEqual(['North', 'South']);
        expect(unsorted.size).toBe(3);
    });

    it('should collapse inner whitespace when matching', () => {
        const spaced = RegionCatalog.fromDefinitions({ Central: ['Spanish Springs'] });

        expect(spaced.regionOf('spanish    springs')).toBe('Central');
    });

    it('should resolve aliases to their village', () => {
        const aliased = RegionCatalog.fromDefinitions({ North: ['Lakeview'] }, { 'Lake View': 'Lakeview' });

        expect(aliased.resolve('lake view')).toEqual({ region: 'North', village: 'Lakeview' });
        expect(aliased.size).toBe(1);
    });

    it('should reject a village listed under two regions', () => {
        expect(() => RegionCatalog.fromDefinitions({ North: ['Lakeview'], South: ['lakeview'] })).toThrow(
            new CatalogError('Village "lakeview" is listed under both "North" and "South"'),
        );
    });

    it('should reject an empty village name', () => {
        expect(() => RegionCatalog.fromDefinitions({ North: ['  '] })).toThrow(CatalogError);
    });

    it('should reject a region without villages', () => {
        expect(() => RegionCatalog.fromDefinitions({ North: ['Lakeview'], Future: [] })).toThrow(
            new CatalogError('Region "Future" has no villages'),
        );
    });

    it('should reject an alias pointing at an unknown village', () => {
        expect(() => RegionCatalog.fromDefinitions({ North: ['Lakeview'] }, { Hilltop: 'Summit' })).toThrow(
            'Alias "Hilltop" points at unknown village "Summit"',
        );
    });
});

describe('loadRegionCatalog', () => {
    const bundled = loadRegionCatalog();

    it('should load the bundled catalog', () => {
        expect(bundled.size).toBe(52);
        expect(bundled.regions()).toEqual([
            'Between 466 & 466A',
            'New Southern / Future',
            'North of 466',
            'South of 44',
            'South of 466A',
        ]);
    });

    it('should keep similarly named villages apart', () => {
        expect(bundled.regionOf('Lake Denham')).toBe('South of 44');
        expect(bundled.regionOf('lake denham east')).toBe('New Southern / Future');
    });

    it('should apply bundled and extra aliases', () => {
        const withExtra = loadRegionCatalog(undefined, { Spanish: 'Spanish Springs' });

        expect(withExtra.regionOf('Saint Lucy')).toBe('South of 44');
        expect(withExtra.regionOf('spanish')).toBe('North of 466');
    });

    it('should throw CatalogError for a missing file', () => {
        expect(() => loadRegionCatalog('/nonexistent/regions.json')).toThrow(CatalogError);
    });
});
