import { createLogger } from '../utils/Logger.ts';

import type {
    Dataset,
    DerivedDataset,
    DerivedObservation,
    Observation,
} from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * numerator / denominator × 100, rounded to 2 decimals.
 * null when either operand is missing or the denominator is 0.
 */
export function percentage(numerator: number | null, denominator: number | null): number | null {
    if (numerator === null || denominator === null || denominator === 0) {
        return null;
    }
    const value = (numerator / denominator) * 100;
    return Number.isFinite(value) ? roundTo(value, 2) : null;
}

export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

export function caseFatalityRate(row: Observation): number | null {
    return percentage(row.totalDeaths, row.totalCases);
}

export function vaccinationRate(row: Observation): number | null {
    return percentage(row.peopleVaccinated, row.population);
}

/**
 * Adds case fatality and vaccination rates to every row.
 * Runs on the full dataset once per load, before any filtering,
 * so every view sees rates from the same formula.
 */
export class MetricDeriver {
    private logger: Logger;

    constructor() {
        this.logger = createLogger('MetricDeriver');
    }

    derive(dataset: Dataset): DerivedDataset {
        this.logger.info(`Deriving metrics for ${dataset.rows.length} rows...`);

        let undefinedRatios = 0;
        const rows: DerivedObservation[] = dataset.rows.map((row) => {
            const derived: DerivedObservation = {
                ...row,
                caseFatalityRate: caseFatalityRate(row),
                vaccinationRate: vaccinationRate(row),
            };
            if (derived.caseFatalityRate === null) undefinedRatios++;
            return derived;
        });

        this.logger.info(
            `Deriving metrics complete: ${undefinedRatios} rows without a case fatality rate`
        );

        return { ...dataset, columns: withDerivedColumns(dataset.columns), rows };
    }
}

function withDerivedColumns(columns: string[]): string[] {
    const extra = ['case_fatality_rate', 'vaccination_rate'].filter((c) => !columns.includes(c));
    return [...columns, ...extra];
}
