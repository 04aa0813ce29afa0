import { createLogger } from '../utils/Logger.ts';

import type { RawDataset } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Anything that can hand over the raw dataset text.
 * The loader depends on this, tests swap in an in-memory source.
 */
export interface DatasetSource {
    fetch(): Promise<RawDataset>;
    getUrl(): string;
}

/**
 * Fetches the OWID COVID-19 CSV over HTTP
 */
export class CsvDatasetSource implements DatasetSource {
    datasetUrl: string;
    private logger: Logger;

    constructor(datasetUrl: string) {
        this.datasetUrl = datasetUrl;
        this.logger = createLogger('CsvDatasetSource');
    }

    async fetch(): Promise<RawDataset> {
        this.logger.info(`Fetching dataset from: ${this.datasetUrl}`);

        const response = await fetch(this.datasetUrl, {
            method: 'GET',
            headers: {
                'Accept': 'text/csv'
            },
            redirect: 'follow'
        });

        if (!response.ok) {
            const err = `Failed to fetch dataset. Status code: ${response.status}`;
            this.logger.error(err);
            throw new Error(err);
        }

        const data = await response.text();
        this.logger.info(`Dataset fetch done. Data size: ${data.length} bytes`);

        return {
            format: 'csv',
            data,
            sourceUrl: this.datasetUrl,
            fetchedAt: new Date(),
        };
    }

    getUrl(): string {
        return this.datasetUrl;
    }
}
