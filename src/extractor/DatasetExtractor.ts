import { csvParse } from 'd3-dsv';

import { createLogger } from '../utils/Logger.ts';
import { parseIsoDate } from '../utils/Dates.ts';

import type { Dataset, Observation, RawDataset } from '../model/Models.ts';
import type { Logger } from 'pino';

type NumericField =
    | 'newCases'
    | 'newDeaths'
    | 'newVaccinations'
    | 'totalCases'
    | 'totalDeaths'
    | 'peopleVaccinated'
    | 'population'
    | 'totalVaccinations';

/**
 * OWID column name → Observation field
 */
const NUMERIC_COLUMNS: Record<string, NumericField> = {
    new_cases: 'newCases',
    new_deaths: 'newDeaths',
    new_vaccinations: 'newVaccinations',
    total_cases: 'totalCases',
    total_deaths: 'totalDeaths',
    people_vaccinated: 'peopleVaccinated',
    population: 'population',
    total_vaccinations: 'totalVaccinations',
};

const LOCATION_COLUMN = 'location';
const DATE_COLUMN = 'date';
const ISO_CODE_COLUMN = 'iso_code';
const CONTINENT_COLUMN = 'continent';

const REQUIRED_COLUMNS = [LOCATION_COLUMN, DATE_COLUMN, ...Object.keys(NUMERIC_COLUMNS)];
const TYPED_COLUMNS = new Set([...REQUIRED_COLUMNS, ISO_CODE_COLUMN, CONTINENT_COLUMN]);

/**
 * Parses the raw OWID CSV into a Dataset.
 *
 * All-or-nothing: a missing required column or a malformed cell throws,
 * so a half-parsed table never reaches the pipeline. Empty cells are
 * legitimate missing measurements and become null.
 */
export class DatasetExtractor {
    private logger: Logger;

    constructor() {
        this.logger = createLogger('DatasetExtractor');
    }

    extract(rawDataset: RawDataset): Dataset {
        this.logger.info('Extracting dataset...');

        const table = csvParse(rawDataset.data);
        const columns = table.columns.slice();

        const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
        if (missing.length > 0) {
            throw new Error(`Missing expected column(s): ${missing.join(', ')}`);
        }

        const untyped = columns.filter((c) => !TYPED_COLUMNS.has(c));
        const rows: Observation[] = [];

        table.forEach((record, i) => {
            // header is line 1
            const line = i + 2;

            const location = (record[LOCATION_COLUMN] ?? '').trim();
            if (location === '') {
                throw new Error(`Empty location on line ${line}`);
            }

            const rawDate = record[DATE_COLUMN] ?? '';
            const date = parseIsoDate(rawDate);
            if (!date) {
                throw new Error(`Invalid date '${rawDate}' on line ${line}`);
            }

            const attributes: Record<string, string> = {};
            for (const column of untyped) {
                attributes[column] = record[column] ?? '';
            }

            const observation: Observation = {
                location,
                isoCode: this.toText(record[ISO_CODE_COLUMN]),
                continent: this.toText(record[CONTINENT_COLUMN]),
                date,
                newCases: null,
                newDeaths: null,
                newVaccinations: null,
                totalCases: null,
                totalDeaths: null,
                peopleVaccinated: null,
                population: null,
                totalVaccinations: null,
                attributes,
            };

            for (const [column, field] of Object.entries(NUMERIC_COLUMNS)) {
                observation[field] = this.toNumber(record[column], column, line);
            }

            rows.push(observation);
        });

        this.logger.info(
            `Extracting dataset complete: ${rows.length} rows, ${columns.length} columns`
        );

        return {
            columns,
            rows,
            sourceUrl: rawDataset.sourceUrl,
            fetchedAt: rawDataset.fetchedAt,
        };
    }

    private toNumber(value: string | undefined, column: string, line: number): number | null {
        const trimmed = (value ?? '').trim();
        if (trimmed.length === 0) {
            return null;
        }
        const parsed = Number(trimmed);
        if (!Number.isFinite(parsed)) {
            throw new Error(`Non-numeric value '${trimmed}' in column '${column}' on line ${line}`);
        }
        return parsed;
    }

    private toText(value: string | undefined): string | null {
        const trimmed = (value ?? '').trim();
        return trimmed.length > 0 ? trimmed : null;
    }
}
