/**
 * Raw CSV payload as fetched from the dataset source
 */
export interface RawDataset {
    format: 'csv';
    data: string;
    sourceUrl: string;
    fetchedAt: Date;
}

/**
 * One (location, date) observation from the OWID dataset.
 * Missing measurements are null, never 0.
 */
export interface Observation {
    location: string;
    isoCode: string | null;
    continent: string | null;
    date: Date;                // YYYY-MM-DD → midnight UTC
    newCases: number | null;
    newDeaths: number | null;
    newVaccinations: number | null;
    totalCases: number | null;
    totalDeaths: number | null;
    peopleVaccinated: number | null;
    population: number | null;
    totalVaccinations: number | null;
    /** Every other CSV column, unmodified */
    attributes: Readonly<Record<string, string>>;
}

/**
 * Observation with the two derived rate columns
 */
export interface DerivedObservation extends Observation {
    caseFatalityRate: number | null;   // percent, 2 decimals
    vaccinationRate: number | null;    // percent, 2 decimals
}

/**
 * The full table across all locations
 */
export interface Dataset<Row extends Observation = Observation> {
    columns: string[];
    rows: Row[];
    sourceUrl: string;
    fetchedAt: Date;
}

export type DerivedDataset = Dataset<DerivedObservation>;

/**
 * One location narrowed to an inclusive date range, sorted by date ascending.
 * Rows are copies; mutating them never touches the source dataset.
 */
export interface FilteredView {
    location: string;
    start: Date;
    end: Date;
    rows: DerivedObservation[];
}

export interface DateSpan {
    start: Date;
    end: Date;
}

// ── Aggregator models ──

/**
 * Daily count fields that can be summed per week
 */
export type DailyCountField = 'newCases' | 'newDeaths' | 'newVaccinations';

export const DAILY_COUNT_FIELDS: readonly DailyCountField[] = [
    'newCases',
    'newDeaths',
    'newVaccinations',
];

export interface SeriesPoint {
    date: Date;
    value: number | null;
}

/**
 * One calendar week (Monday..Sunday) labelled by its Sunday
 */
export interface WeeklyAggregate {
    weekStart: Date;
    weekEnding: Date;
    totals: Record<DailyCountField, number>;
    /** Percent change vs. the previous week; null when there is no baseline */
    pctChange: Record<DailyCountField, number | null>;
}

// ── Dashboard models ──

export type MetricCode =
    | 'new_cases'
    | 'new_deaths'
    | 'new_vaccinations'
    | 'case_fatality_rate';

export interface MetricInfo {
    code: MetricCode;
    label: string;             // 'New cases'
    field: keyof Pick<DerivedObservation, DailyCountField | 'caseFatalityRate'>;
    smoothed: boolean;         // rolling average applies
}

export interface DashboardQuery {
    location: string;
    start: Date;
    end: Date;
    window: number;
    metrics: MetricCode[];
}

export interface MetricSeries {
    metric: MetricCode;
    name: string;              // 'New Cases (7-day avg)'
    points: SeriesPoint[];
}

export interface MetricCards {
    date: Date;
    totalCases: number | null;
    totalDeaths: number | null;
    vaccinationRate: number | null;
    caseFatalityRate: number | null;
}

export interface TableRow {
    date: Date;
    newCases: number | null;
    newDeaths: number | null;
    newVaccinations: number | null;
    caseFatalityRate: number | null;
    vaccinationRate: number | null;
}

export interface DashboardView {
    location: string;
    start: Date;
    end: Date;
    window: number;
    lastUpdated: Date;
    cards: MetricCards;
    series: MetricSeries[];
    weekly: WeeklyAggregate[];
    /** Detailed data, newest first */
    table: TableRow[];
}

export interface DashboardControls {
    locations: string[];
    defaultLocation: string;
    dateSpan: DateSpan;
    /** Latest observation date in the dataset */
    lastUpdated: Date;
    /** When the dataset was fetched from its source */
    lastRefresh: Date;
    metrics: MetricInfo[];
    defaultMetrics: MetricCode[];
    window: { min: number; max: number; default: number };
    sourceUrl: string;
}

export interface CsvExport {
    fileName: string;
    csv: string;
    rowCount: number;
}
