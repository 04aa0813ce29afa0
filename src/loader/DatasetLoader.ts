import { createLogger } from '../utils/Logger.ts';
import { DatasetExtractor } from '../extractor/DatasetExtractor.ts';
import { DataUnavailableError } from '../model/Errors.ts';

import type { Dataset } from '../model/Models.ts';
import type { DatasetSource } from '../source/CsvDatasetSource.ts';
import type { Logger } from 'pino';

/**
 * A cached dataset with the time it was created and how long it stays valid
 */
export interface CacheEntry {
    dataset: Dataset;
    createdAt: number;
    ttlMs: number;
}

export interface DatasetLoaderOptions {
    ttlMs: number;
    /** Epoch millis; injectable for tests */
    now?: () => number;
}

/**
 * Fetches and parses the dataset, memoized for a time-to-live window.
 *
 * The cached entry is replaced wholesale on refresh. There is at most one
 * fetch in flight: callers with no dataset at all wait for it, callers that
 * find an expired entry keep getting that entry until the refresh lands.
 * A refresh started before invalidate() never installs its result.
 */
export class DatasetLoader {
    private logger: Logger;
    private source: DatasetSource;
    private extractor: DatasetExtractor;
    private ttlMs: number;
    private now: () => number;
    private entry: CacheEntry | null = null;
    private inflight: Promise<Dataset> | null = null;
    private generation = 0;

    constructor(source: DatasetSource, options: DatasetLoaderOptions) {
        this.logger = createLogger('DatasetLoader');
        this.source = source;
        this.extractor = new DatasetExtractor();
        this.ttlMs = options.ttlMs;
        this.now = options.now ?? Date.now;
    }

    async load(): Promise<Dataset> {
        const entry = this.entry;
        if (entry && this.isFresh(entry)) {
            return entry.dataset;
        }

        const refresh = this.startRefresh();
        if (!entry) {
            return refresh;
        }

        // expired: serve the previous dataset until the refresh replaces it
        refresh.catch((err: unknown) => {
            this.logger.warn({ err }, 'Refresh failed, keeping the expired dataset');
        });
        return entry.dataset;
    }

    /**
     * Drops the cached entry and any refresh in flight; the next load() fetches again.
     */
    invalidate(): void {
        this.generation++;
        this.entry = null;
        this.inflight = null;
    }

    isRefreshing(): boolean {
        return this.inflight !== null;
    }

    getCacheEntry(): CacheEntry | null {
        return this.entry;
    }

    private isFresh(entry: CacheEntry): boolean {
        return this.now() - entry.createdAt < entry.ttlMs;
    }

    private startRefresh(): Promise<Dataset> {
        if (this.inflight) {
            return this.inflight;
        }
        const refresh: Promise<Dataset> = this.refresh(this.generation).finally(() => {
            if (this.inflight === refresh) {
                this.inflight = null;
            }
        });
        this.inflight = refresh;
        return refresh;
    }

    private async refresh(generation: number): Promise<Dataset> {
        this.logger.info(`Loading dataset from ${this.source.getUrl()}`);
        let dataset: Dataset;
        try {
            const raw = await this.source.fetch();
            dataset = this.extractor.extract(raw);
        } catch (err) {
            this.logger.error({ err }, 'Dataset load failed');
            throw new DataUnavailableError(
                `Dataset unavailable: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err }
            );
        }

        if (generation !== this.generation) {
            this.logger.info('Dataset discarded: cache was invalidated during the fetch');
            return dataset;
        }

        this.entry = {
            dataset,
            createdAt: this.now(),
            ttlMs: this.ttlMs,
        };
        this.logger.info(`Dataset cached: ${dataset.rows.length} rows, ttl ${this.ttlMs} ms`);
        return dataset;
    }
}
