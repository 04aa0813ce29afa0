import { buildCsv } from './InMemoryDatasetSource.ts';
import type { CsvRow } from './InMemoryDatasetSource.ts';

/**
 * Testland: 2023-01-02 (Mon) .. 2023-01-10, new cases 10, 20, … 90.
 * Otherland: only 2023-01-01 and 2023-01-12, widening the dataset span.
 * The last Testland row has total_cases 0, so its fatality rate is undefined.
 */
export const DASHBOARD_ROWS: CsvRow[] = [
    { location: 'Otherland', date: '2023-01-01', new_cases: 5 },
    { location: 'Testland', date: '2023-01-02', new_cases: 10, new_deaths: 1, total_cases: 100, total_deaths: 2, people_vaccinated: 250, population: 1000 },
    { location: 'Testland', date: '2023-01-03', new_cases: 20, new_deaths: 1, total_cases: 120, total_deaths: 3 },
    { location: 'Testland', date: '2023-01-04', new_cases: 30 },
    { location: 'Testland', date: '2023-01-05', new_cases: 40 },
    { location: 'Testland', date: '2023-01-06', new_cases: 50 },
    { location: 'Testland', date: '2023-01-07', new_cases: 60 },
    { location: 'Testland', date: '2023-01-08', new_cases: 70 },
    { location: 'Testland', date: '2023-01-09', new_cases: 80 },
    { location: 'Testland', date: '2023-01-10', new_cases: 90, new_deaths: 2, total_cases: 0, total_deaths: 50, people_vaccinated: 300, population: 1000 },
    { location: 'Otherland', date: '2023-01-12', new_cases: 6 },
];

export const DASHBOARD_CSV = buildCsv(DASHBOARD_ROWS);
