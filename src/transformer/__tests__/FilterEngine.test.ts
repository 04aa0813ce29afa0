import { describe, test, expect } from 'vitest';
import { dateSpan, filterDataset, isEmpty, latestRow, listLocations } from '../FilterEngine.ts';
import { NoDataInRangeError } from '../../model/Errors.ts';
import type { DerivedDataset, DerivedObservation } from '../../model/Models.ts';

// ── Test helpers ──

function day(iso: string): Date {
    return new Date(`${iso}T00:00:00Z`);
}

function makeRow(location: string, date: string, newCases: number | null = null): DerivedObservation {
    return {
        location,
        isoCode: null,
        continent: null,
        date: day(date),
        newCases,
        newDeaths: null,
        newVaccinations: null,
        totalCases: null,
        totalDeaths: null,
        peopleVaccinated: null,
        population: null,
        totalVaccinations: null,
        attributes: { tests_units: 'tests performed' },
        caseFatalityRate: null,
        vaccinationRate: null,
    };
}

function makeDataset(rows: DerivedObservation[]): DerivedDataset {
    return {
        columns: [],
        rows,
        sourceUrl: 'https://example.test/data.csv',
        fetchedAt: day('2024-01-01'),
    };
}

const DATASET = makeDataset([
    makeRow('Testland', '2023-01-04', 40),
    makeRow('Otherland', '2023-01-02', 999),
    makeRow('Testland', '2023-01-01', 10),
    makeRow('testland', '2023-01-02', 555),
    makeRow('Testland', '2023-01-05', 50),
    makeRow('Testland', '2023-01-02', 20),
    makeRow('Testland', '2023-01-03', 30),
]);

// ── Tests ──

describe('filterDataset', () => {
    test('keeps only the exact location within the inclusive range, sorted by date', () => {
        const view = filterDataset(DATASET, 'Testland', day('2023-01-02'), day('2023-01-04'));

        expect(view.location).toBe('Testland');
        expect(view.rows.map((r) => r.newCases)).toEqual([20, 30, 40]);
        expect(view.rows.every((r) => r.location === 'Testland')).toBe(true);
    });

    test('location match is case-sensitive', () => {
        const view = filterDataset(DATASET, 'testland', day('2023-01-01'), day('2023-01-05'));

        expect(view.rows.map((r) => r.newCases)).toEqual([555]);
    });

    test('equal dates keep their source order', () => {
        const dataset = makeDataset([
            makeRow('Testland', '2023-01-02', 1),
            makeRow('Testland', '2023-01-01', 0),
            makeRow('Testland', '2023-01-02', 2),
        ]);

        const view = filterDataset(dataset, 'Testland', day('2023-01-01'), day('2023-01-02'));

        expect(view.rows.map((r) => r.newCases)).toEqual([0, 1, 2]);
    });

    test('returns an independent copy', () => {
        const view = filterDataset(DATASET, 'Testland', day('2023-01-01'), day('2023-01-01'));

        view.rows[0].newCases = -1;
        view.rows[0].date.setUTCFullYear(1999);
        view.rows[0].attributes = { tests_units: 'changed' };

        const again = filterDataset(DATASET, 'Testland', day('2023-01-01'), day('2023-01-01'));
        expect(again.rows[0].newCases).toBe(10);
        expect(again.rows[0].date).toEqual(day('2023-01-01'));
        expect(again.rows[0].attributes).toEqual({ tests_units: 'tests performed' });
    });

    test('unknown location → empty view', () => {
        const view = filterDataset(DATASET, 'Nowhere', day('2023-01-01'), day('2023-01-05'));

        expect(isEmpty(view)).toBe(true);
    });
});

describe('latestRow', () => {
    test('returns the last row by date', () => {
        const view = filterDataset(DATASET, 'Testland', day('2023-01-01'), day('2023-01-05'));

        expect(latestRow(view).newCases).toBe(50);
    });

    test('empty view → NoDataInRangeError', () => {
        const view = filterDataset(DATASET, 'Testland', day('2022-01-01'), day('2022-12-31'));

        expect(() => latestRow(view)).toThrow(NoDataInRangeError);
        expect(() => latestRow(view)).toThrow(
            "No data for 'Testland' between 2022-01-01 and 2022-12-31"
        );
    });
});

describe('listLocations / dateSpan', () => {
    test('sorted unique locations', () => {
        expect(listLocations(DATASET)).toEqual(['Otherland', 'Testland', 'testland']);
    });

    test('observed date span', () => {
        expect(dateSpan(DATASET)).toEqual({ start: day('2023-01-01'), end: day('2023-01-05') });
    });

    test('empty dataset has no span', () => {
        expect(dateSpan(makeDataset([]))).toBeNull();
    });
});
