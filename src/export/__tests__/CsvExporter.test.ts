import { describe, test, expect } from 'vitest';
import { csvParse } from 'd3-dsv';
import { exportFileName, exportView, toCsv } from '../CsvExporter.ts';
import type { DerivedObservation, FilteredView } from '../../model/Models.ts';

// ── Test helpers ──

function day(iso: string): Date {
    return new Date(`${iso}T00:00:00Z`);
}

function makeRow(date: string, overrides: Partial<DerivedObservation> = {}): DerivedObservation {
    return {
        location: 'Testland',
        isoCode: 'TST',
        continent: 'Europe',
        date: day(date),
        newCases: null,
        newDeaths: null,
        newVaccinations: null,
        totalCases: null,
        totalDeaths: null,
        peopleVaccinated: null,
        population: null,
        totalVaccinations: null,
        attributes: {},
        caseFatalityRate: null,
        vaccinationRate: null,
        ...overrides,
    };
}

const VIEW: FilteredView = {
    location: 'Testland',
    start: day('2023-01-01'),
    end: day('2023-01-03'),
    rows: [
        makeRow('2023-01-01', { newCases: 10, newDeaths: 1, caseFatalityRate: 1.23, vaccinationRate: 40.5 }),
        makeRow('2023-01-02', { newCases: 20, newVaccinations: 300, caseFatalityRate: 1.25 }),
        makeRow('2023-01-03', { newCases: 0, newDeaths: 0, caseFatalityRate: 2.33, vaccinationRate: 41 }),
    ],
};

// ── Tests ──

describe('toCsv', () => {
    test('writes the export columns, one line per row, blanks for missing values', () => {
        expect(toCsv(VIEW).split('\n')).toEqual([
            'date,new_cases,new_deaths,new_vaccinations,case_fatality_rate,vaccination_rate',
            '2023-01-01,10,1,,1.23,40.5',
            '2023-01-02,20,,300,1.25,',
            '2023-01-03,0,0,,2.33,41',
        ]);
    });

    test('empty view → header only', () => {
        expect(toCsv({ ...VIEW, rows: [] })).toBe(
            'date,new_cases,new_deaths,new_vaccinations,case_fatality_rate,vaccination_rate'
        );
    });

    test('round trip keeps row count, date order and derived values', () => {
        const parsed = csvParse(toCsv(VIEW));

        expect(parsed).toHaveLength(VIEW.rows.length);
        expect(parsed.map((r) => r.date)).toEqual(['2023-01-01', '2023-01-02', '2023-01-03']);
        parsed.forEach((record, i) => {
            const row = VIEW.rows[i];
            expect(Number(record.case_fatality_rate)).toBeCloseTo(row.caseFatalityRate ?? NaN, 2);
        });
        expect(parsed[1].vaccination_rate).toBe('');
    });
});

describe('exportView', () => {
    test('file name carries location and date', () => {
        expect(exportFileName('United States', day('2024-03-09'))).toBe(
            'covid_data_United States_20240309.csv'
        );
    });

    test('bundles csv, file name and row count', () => {
        const result = exportView(VIEW, day('2024-03-09'));

        expect(result.fileName).toBe('covid_data_Testland_20240309.csv');
        expect(result.rowCount).toBe(3);
        expect(result.csv).toBe(toCsv(VIEW));
    });
});
