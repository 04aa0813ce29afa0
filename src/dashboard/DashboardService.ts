import { createLogger } from '../utils/Logger.ts';
import { formatIsoDate, parseIsoDate } from '../utils/Dates.ts';
import { DataUnavailableError, InvalidQueryError } from '../model/Errors.ts';
import { MetricDeriver } from '../transformer/MetricDeriver.ts';
import {
    dateSpan,
    filterDataset,
    latestRow,
    listLocations,
} from '../transformer/FilterEngine.ts';
import {
    DEFAULT_WINDOW,
    MAX_WINDOW,
    MIN_WINDOW,
    rollingAverage,
    weeklyResample,
} from '../transformer/Aggregator.ts';
import { exportView } from '../export/CsvExporter.ts';

import type {
    CsvExport,
    DashboardControls,
    DashboardQuery,
    DashboardView,
    Dataset,
    DateSpan,
    DerivedDataset,
    FilteredView,
    MetricCode,
    MetricInfo,
    MetricSeries,
} from '../model/Models.ts';
import type { DatasetLoader } from '../loader/DatasetLoader.ts';
import type { Logger } from 'pino';

export const METRICS: MetricInfo[] = [
    { code: 'new_cases', label: 'New cases', field: 'newCases', smoothed: true },
    { code: 'new_deaths', label: 'New deaths', field: 'newDeaths', smoothed: true },
    { code: 'new_vaccinations', label: 'New vaccinations', field: 'newVaccinations', smoothed: true },
    { code: 'case_fatality_rate', label: 'Case fatality rate', field: 'caseFatalityRate', smoothed: false },
];

export const DEFAULT_METRICS: MetricCode[] = ['new_cases', 'new_deaths'];

/**
 * Controls as they arrive from the client, all optional strings
 */
export interface RawDashboardQuery {
    location?: string;
    start?: string;
    end?: string;
    window?: string;
    metrics?: string;
}

/**
 * Holds the prepared dataset for the current cache window
 */
interface Prepared {
    source: Dataset;
    derived: DerivedDataset;
    locations: string[];
    span: DateSpan;
}

/**
 * Runs the pipeline (load → derive → filter → aggregate) for one set of
 * user controls. Every call recomputes the view from the cached dataset;
 * metrics are derived once per loaded dataset.
 */
export class DashboardService {
    private logger: Logger;
    private loader: DatasetLoader;
    private deriver: MetricDeriver;
    private defaultLocation: string;
    private prepared: Prepared | null = null;

    constructor(loader: DatasetLoader, defaultLocation: string = 'United States') {
        this.logger = createLogger('DashboardService');
        this.loader = loader;
        this.deriver = new MetricDeriver();
        this.defaultLocation = defaultLocation;
    }

    async getControls(): Promise<DashboardControls> {
        const { derived, locations, span } = await this.prepare();
        return {
            locations,
            defaultLocation: this.resolveDefaultLocation(locations),
            dateSpan: span,
            lastUpdated: span.end,
            lastRefresh: derived.fetchedAt,
            metrics: METRICS,
            defaultMetrics: DEFAULT_METRICS,
            window: { min: MIN_WINDOW, max: MAX_WINDOW, default: DEFAULT_WINDOW },
            sourceUrl: derived.sourceUrl,
        };
    }

    async getDashboard(raw: RawDashboardQuery): Promise<DashboardView> {
        const prepared = await this.prepare();
        const query = this.parseQuery(raw, prepared);
        const view = filterDataset(prepared.derived, query.location, query.start, query.end);

        this.logger.info(
            `Dashboard for ${query.location} ${formatIsoDate(query.start)}..${formatIsoDate(query.end)}: ${view.rows.length} rows`
        );

        const latest = latestRow(view);

        return {
            location: query.location,
            start: query.start,
            end: query.end,
            window: query.window,
            lastUpdated: prepared.span.end,
            cards: {
                date: latest.date,
                totalCases: latest.totalCases,
                totalDeaths: latest.totalDeaths,
                vaccinationRate: latest.vaccinationRate,
                caseFatalityRate: latest.caseFatalityRate,
            },
            series: query.metrics.map((code) => this.buildSeries(view, code, query.window)),
            weekly: weeklyResample(view),
            table: view.rows
                .map((row) => ({
                    date: row.date,
                    newCases: row.newCases,
                    newDeaths: row.newDeaths,
                    newVaccinations: row.newVaccinations,
                    caseFatalityRate: row.caseFatalityRate,
                    vaccinationRate: row.vaccinationRate,
                }))
                .reverse(),
        };
    }

    async getExport(raw: RawDashboardQuery, now: Date = new Date()): Promise<CsvExport> {
        const prepared = await this.prepare();
        const query = this.parseQuery(raw, prepared);
        const view = filterDataset(prepared.derived, query.location, query.start, query.end);
        this.logger.info(`Exporting ${view.rows.length} rows for ${query.location}`);
        return exportView(view, now);
    }

    /**
     * Validates raw controls against the loaded dataset.
     * @throws InvalidQueryError
     */
    private parseQuery(raw: RawDashboardQuery, prepared: Prepared): DashboardQuery {
        const location = raw.location ?? this.resolveDefaultLocation(prepared.locations);
        if (!prepared.locations.includes(location)) {
            throw new InvalidQueryError(`Unknown location '${location}'`, 'location');
        }

        const start = raw.start !== undefined ? this.parseDate(raw.start, 'start') : prepared.span.start;
        const end = raw.end !== undefined ? this.parseDate(raw.end, 'end') : prepared.span.end;
        if (start.getTime() > end.getTime()) {
            throw new InvalidQueryError('start must not be after end', 'start');
        }
        const beforeSpan = start.getTime() < prepared.span.start.getTime();
        if (beforeSpan || end.getTime() > prepared.span.end.getTime()) {
            throw new InvalidQueryError(
                `Date range must lie within ${formatIsoDate(prepared.span.start)}..${formatIsoDate(prepared.span.end)}`,
                beforeSpan ? 'start' : 'end'
            );
        }

        let window = DEFAULT_WINDOW;
        if (raw.window !== undefined) {
            window = Number(raw.window);
            if (!Number.isInteger(window) || window < MIN_WINDOW || window > MAX_WINDOW) {
                throw new InvalidQueryError(
                    `window must be an integer between ${MIN_WINDOW} and ${MAX_WINDOW}`,
                    'window'
                );
            }
        }

        const metrics = raw.metrics !== undefined ? this.parseMetrics(raw.metrics) : DEFAULT_METRICS;

        return { location, start, end, window, metrics };
    }

    private buildSeries(view: FilteredView, code: MetricCode, window: number): MetricSeries {
        const info = metricInfo(code);
        const values = view.rows.map((row) => row[info.field]);
        const smoothed = info.smoothed ? rollingAverage(values, window) : values;
        const name = info.smoothed
            ? `${titleCase(info.label)} (${window}-day avg)`
            : `${titleCase(info.label)} (%)`;

        return {
            metric: code,
            name,
            points: view.rows.map((row, i) => ({ date: row.date, value: smoothed[i] })),
        };
    }

    private resolveDefaultLocation(locations: string[]): string {
        return locations.includes(this.defaultLocation) ? this.defaultLocation : locations[0];
    }

    private parseDate(value: string, parameter: string): Date {
        const date = parseIsoDate(value);
        if (!date) {
            throw new InvalidQueryError(`${parameter} must be a YYYY-MM-DD date`, parameter);
        }
        return date;
    }

    private parseMetrics(value: string): MetricCode[] {
        const codes = value.split(',').map((c) => c.trim()).filter((c) => c.length > 0);
        const metrics: MetricCode[] = [];
        for (const code of codes) {
            const info = METRICS.find((m) => m.code === code);
            if (!info) {
                throw new InvalidQueryError(`Unknown metric '${code}'`, 'metrics');
            }
            if (!metrics.includes(info.code)) {
                metrics.push(info.code);
            }
        }
        return metrics;
    }

    /**
     * Derives metrics once per loaded dataset. The loader returns the same
     * object for the whole cache window, so identity tells us when to redo it.
     */
    private async prepare(): Promise<Prepared> {
        const source = await this.loader.load();
        if (this.prepared && this.prepared.source === source) {
            return this.prepared;
        }

        const derived = this.deriver.derive(source);
        const span = dateSpan(derived);
        if (!span) {
            throw new DataUnavailableError('Dataset contains no rows');
        }
        this.prepared = { source, derived, locations: listLocations(derived), span };
        return this.prepared;
    }
}

function metricInfo(code: MetricCode): MetricInfo {
    const info = METRICS.find((m) => m.code === code);
    if (!info) {
        throw new Error(`Unknown metric '${code}'`);
    }
    return info;
}

function titleCase(label: string): string {
    return label.replace(/\b\w/g, (c) => c.toUpperCase());
}
