// src/index.ts

import { loadConfig } from './config/Config.ts';
import { CsvDatasetSource } from './source/CsvDatasetSource.ts';
import { DatasetLoader } from './loader/DatasetLoader.ts';
import { DashboardService } from './dashboard/DashboardService.ts';
import { formatIsoDate } from './utils/Dates.ts';
import type { DashboardView } from './model/Models.ts';
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');

/**
 * Text preview of the dashboard for one location.
 *
 * Usage: npm run preview -- "Finland" [window]
 */
async function main() {
    const config = loadConfig();
    const [location, window] = process.argv.slice(2);

    const source = new CsvDatasetSource(config.datasetUrl);
    const loader = new DatasetLoader(source, { ttlMs: config.cacheTtlMs });
    const service = new DashboardService(loader, config.defaultLocation);

    try {
        const view = await service.getDashboard({
            location,
            window,
            metrics: 'new_cases,new_deaths,new_vaccinations,case_fatality_rate',
        });
        prettyPrintDashboard(view);
    } catch (err) {
        logger.error({ err }, 'Preview failed');
        throw err;
    }
}

function prettyPrintDashboard(view: DashboardView) {
    const num = (v: number | null, digits = 0) =>
        v === null ? '—' : v.toLocaleString('en-US', { maximumFractionDigits: digits });
    const pct = (v: number | null) => (v === null ? '—' : `${v >= 0 ? '+' : ''}${v.toFixed(1)}%`);

    console.log('\n' + '═'.repeat(80));
    console.log(`  COVID-19 Analytics: ${view.location}`);
    console.log(`  Range: ${formatIsoDate(view.start)} … ${formatIsoDate(view.end)} | Last updated: ${formatIsoDate(view.lastUpdated)}`);
    console.log('═'.repeat(80));

    const { cards } = view;
    console.log(`  Total cases:        ${num(cards.totalCases)}`);
    console.log(`  Total deaths:       ${num(cards.totalDeaths)}`);
    console.log(`  Vaccination rate:   ${cards.vaccinationRate === null ? '—' : `${cards.vaccinationRate.toFixed(1)}%`}`);
    console.log(`  Case fatality rate: ${cards.caseFatalityRate === null ? '—' : `${cards.caseFatalityRate.toFixed(2)}%`}`);

    console.log('  ' + '─'.repeat(76));
    for (const series of view.series) {
        const last = series.points.at(-1);
        console.log(`  ${series.name.padEnd(36)} ${num(last ? last.value : null, 2).padStart(14)}`);
    }

    console.log('  ' + '─'.repeat(76));
    const header = `  ${'Week ending'.padEnd(12)} ${'Cases'.padStart(12)} ${'Δ'.padStart(8)} ${'Deaths'.padStart(10)} ${'Δ'.padStart(8)} ${'Vaccinations'.padStart(14)} ${'Δ'.padStart(8)}`;
    console.log(header);
    for (const week of view.weekly) {
        console.log(
            `  ${formatIsoDate(week.weekEnding).padEnd(12)} ${num(week.totals.newCases).padStart(12)} ${pct(week.pctChange.newCases).padStart(8)} ${num(week.totals.newDeaths).padStart(10)} ${pct(week.pctChange.newDeaths).padStart(8)} ${num(week.totals.newVaccinations).padStart(14)} ${pct(week.pctChange.newVaccinations).padStart(8)}`
        );
    }

    console.log('═'.repeat(80) + '\n');
}

await main();
