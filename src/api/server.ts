import { createLogger } from '../utils/Logger.ts';
import { loadConfig } from '../config/Config.ts';
import { CsvDatasetSource } from '../source/CsvDatasetSource.ts';
import { DatasetLoader } from '../loader/DatasetLoader.ts';
import { DashboardService } from '../dashboard/DashboardService.ts';
import { buildApp } from './app.ts';

const logger = createLogger('API');

async function main() {
    const config = loadConfig();
    const source = new CsvDatasetSource(config.datasetUrl);
    const loader = new DatasetLoader(source, { ttlMs: config.cacheTtlMs });
    const service = new DashboardService(loader, config.defaultLocation);

    const app = await buildApp(service);
    const address = await app.listen({ port: config.apiPort, host: config.apiHost });
    logger.info(`API server running on ${address}`);
}

main().catch((err) => {
    logger.error({ err }, 'Failed to start API server');
    process.exit(1);
});
