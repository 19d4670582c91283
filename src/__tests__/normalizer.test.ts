import { describe, expect, it } from 'vitest';

import { normalizeRow, normalizeRows, parseSourceId, parseStatus } from '../normalizer.js';
import { catalog } from './helpers/fixtures.js';

describe('parseStatus', () => {
    it('should map accepted status text regardless of case and spacing', () => {
        expect(parseStatus('Active')).toBe('active');
        expect(parseStatus('  for   SALE ')).toBe('active');
        expect(parseStatus('UNDER CONTRACT')).toBe('pending');
        expect(parseStatus('Sale Pending')).toBe('pending');
    });

    it('should return null for anything outside the vocabulary', () => {
        expect(parseStatus('sold')).toBeNull();
        expect(parseStatus('activ')).toBeNull();
        expect(parseStatus('constructor')).toBeNull();
        expect(parseStatus('')).toBeNull();
        expect(parseStatus(undefined)).toBeNull();
        expect(parseStatus(1)).toBeNull();
    });
});

describe('parseSourceId', () => {
    it('should prefer id, then sourceId, then listingId', () => {
        expect(parseSourceId({ id: 'a1', sourceId: 'b2' })).toBe('a1');
        expect(parseSourceId({ id: '  ', sourceId: 'b2' })).toBe('b2');
        expect(parseSourceId({ listingId: 'c3' })).toBe('c3');
    });

    it('should stringify finite numeric ids', () => {
        expect(parseSourceId({ id: 17 })).toBe('17');
        expect(parseSourceId({ id: Number.NaN })).toBeNull();
    });

    it('should return null when no id is present', () => {
        expect(parseSourceId({ village: 'Lakeview' })).toBeNull();
    });
});

describe('normalizeRow', () => {
    it('should produce a listing with the catalog spelling and region', () => {
        const result = normalizeRow({ village: ' lakeVIEW ', status: 'Pending', id: 'x-1', type: 'Preowned' }, catalog);

        expect(result).toEqual({
            ok: true,
            listing: { village: 'Lakeview', region: 'North', status: 'pending', sourceId: 'x-1', type: 'preowned' },
        });
    });

    it('should reject a missing or blank village as EmptyVillage', () => {
        expect(normalizeRow({ status: 'Active' }, catalog)).toMatchObject({ ok: false, reason: 'EmptyVillage' });
        expect(normalizeRow({ village: '   ', status: 'Active' }, catalog)).toMatchObject({ reason: 'EmptyVillage' });
        expect(normalizeRow({ village: 42, status: 'Active' }, catalog)).toMatchObject({ reason: 'EmptyVillage' });
    });

    it('should reject items that are not objects as EmptyVillage', () => {
        for (const item of [null, 'garbage', 42, ['Lakeview', 'Active']]) {
            expect(normalizeRow(item, catalog)).toEqual({ ok: false, reason: 'EmptyVillage', row: item });
        }
    });

    it('should reject unrecognised status text as UnknownStatus', () => {
        const row = { village: 'Oakwood', status: 'bogus' };

        expect(normalizeRow(row, catalog)).toEqual({ ok: false, reason: 'UnknownStatus', row });
    });

    it('should reject a village outside the catalog as UnknownVillage', () => {
        expect(normalizeRow({ village: 'Nowhere', status: 'Active' }, catalog)).toMatchObject({
            ok: false,
            reason: 'UnknownVillage',
        });
    });

    it('should check the village text before the status and the status before the catalog', () => {
        expect(normalizeRow({ village: '', status: 'bogus' }, catalog)).toMatchObject({ reason: 'EmptyVillage' });
        expect(normalizeRow({ village: 'Nowhere', status: 'bogus' }, catalog)).toMatchObject({
            reason: 'UnknownStatus',
        });
    });

    it('should leave unknown listing types as null', () => {
        const result = normalizeRow({ village: 'Oakwood', status: 'Active', type: 'model' }, catalog);

        expect(result).toMatchObject({ ok: true, listing: { type: null } });
    });
});

describe('normalizeRows', () => {
    it('should split accepted listings from counted rejects', () => {
        const batch = normalizeRows(
            [
                { village: 'Lakeview', status: 'Active' },
                { village: 'lakeview ', status: 'Pending' },
                { village: 'Oakwood', status: 'bogus' },
                { village: 'Nowhere', status: 'Active' },
                { status: 'Active' },
            ],
            catalog,
        );

        expect(batch.listings.map((listing) => listing.status)).toEqual(['active', 'pending']);
        expect(batch.rejected).toBe(3);
        expect(batch.rejectsByReason).toEqual({ EmptyVillage: 1, UnknownStatus: 1, UnknownVillage: 1 });
    });

    it('should return empty results for no rows', () => {
        expect(normalizeRows([], catalog)).toEqual({
            listings: [],
            rejected: 0,
            rejectsByReason: { EmptyVillage: 0, UnknownStatus: 0, UnknownVillage: 0 },
        });
    });
});
