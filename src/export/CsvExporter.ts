import { csvFormat } from 'd3-dsv';

import { formatCompactDate, formatIsoDate } from '../utils/Dates.ts';

import type { CsvExport, FilteredView } from '../model/Models.ts';

export const EXPORT_COLUMNS = [
    'date',
    'new_cases',
    'new_deaths',
    'new_vaccinations',
    'case_fatality_rate',
    'vaccination_rate',
] as const;

type ExportRow = Record<(typeof EXPORT_COLUMNS)[number], string>;

/**
 * Serializes a filtered view in view order. Missing values are empty cells.
 */
export function toCsv(view: FilteredView): string {
    const rows: ExportRow[] = view.rows.map((row) => ({
        date: formatIsoDate(row.date),
        new_cases: cell(row.newCases),
        new_deaths: cell(row.newDeaths),
        new_vaccinations: cell(row.newVaccinations),
        case_fatality_rate: cell(row.caseFatalityRate),
        vaccination_rate: cell(row.vaccinationRate),
    }));
    return csvFormat(rows, [...EXPORT_COLUMNS]);
}

export function exportFileName(location: string, now: Date): string {
    return `covid_data_${location}_${formatCompactDate(now)}.csv`;
}

export function exportView(view: FilteredView, now: Date = new Date()): CsvExport {
    return {
        fileName: exportFileName(view.location, now),
        csv: toCsv(view),
        rowCount: view.rows.length,
    };
}

function cell(value: number | null): string {
    return value === null ? '' : String(value);
}
