import { mean, rollup, sum } from 'd3-array';
import { utcDay, utcMonday } from 'd3-time';

import { DAILY_COUNT_FIELDS } from '../model/Models.ts';

import type {
    DailyCountField,
    FilteredView,
    WeeklyAggregate,
} from '../model/Models.ts';

export const MIN_WINDOW = 1;
export const MAX_WINDOW = 14;
export const DEFAULT_WINDOW = 7;
export const EXPOSED_WEEKS = 4;

/**
 * Trailing mean over `window` rows, current row included.
 *
 * The first window-1 points average over the rows that exist (the line has
 * no leading holes). Missing values inside a window are skipped; a window
 * with no values at all yields null. Output length equals input length.
 */
export function rollingAverage(
    series: readonly (number | null)[],
    window: number
): (number | null)[] {
    if (!Number.isInteger(window) || window < MIN_WINDOW || window > MAX_WINDOW) {
        throw new RangeError(
            `Rolling window must be an integer in [${MIN_WINDOW}, ${MAX_WINDOW}], got ${window}`
        );
    }
    return series.map((_, i) => {
        const slice = series.slice(Math.max(0, i - window + 1), i + 1);
        return mean(slice) ?? null;
    });
}

/**
 * (current - previous) / previous × 100, null without a usable baseline
 */
export function percentChange(current: number, previous: number | null): number | null {
    if (previous === null || previous === 0) {
        return null;
    }
    return ((current - previous) / previous) * 100;
}

/**
 * Sums the daily counts of the view per calendar week (Monday..Sunday,
 * labelled by the Sunday) and adds week-over-week percent change.
 *
 * Weeks between the first and last observation with no rows are kept with
 * zero sums. Only the last `weeks` weeks are returned; the first of them
 * has no baseline, so its change is null.
 */
export function weeklyResample(view: FilteredView, weeks: number = EXPOSED_WEEKS): WeeklyAggregate[] {
    if (!Number.isInteger(weeks) || weeks < 1) {
        throw new RangeError(`Week count must be a positive integer, got ${weeks}`);
    }
    if (view.rows.length === 0) {
        return [];
    }

    const byWeek = rollup(
        view.rows,
        (rows) => totalsOf(rows),
        (row) => utcMonday.floor(row.date).getTime()
    );

    const first = utcMonday.floor(view.rows[0].date);
    const last = utcMonday.floor(view.rows[view.rows.length - 1].date);
    const weekStarts = utcMonday.range(first, utcDay.offset(last, 1)).slice(-weeks);

    let previous: Record<DailyCountField, number> | null = null;
    const result: WeeklyAggregate[] = [];

    for (const weekStart of weekStarts) {
        const totals = byWeek.get(weekStart.getTime()) ?? zeroTotals();
        result.push({
            weekStart,
            weekEnding: utcDay.offset(weekStart, 6),
            totals,
            pctChange: {
                newCases: percentChange(totals.newCases, previous ? previous.newCases : null),
                newDeaths: percentChange(totals.newDeaths, previous ? previous.newDeaths : null),
                newVaccinations: percentChange(
                    totals.newVaccinations,
                    previous ? previous.newVaccinations : null
                ),
            },
        });
        previous = totals;
    }

    return result;
}

function totalsOf(rows: FilteredView['rows']): Record<DailyCountField, number> {
    const totals = zeroTotals();
    for (const field of DAILY_COUNT_FIELDS) {
        // missing values count as 0
        totals[field] = sum(rows, (row) => row[field]);
    }
    return totals;
}

function zeroTotals(): Record<DailyCountField, number> {
    return { newCases: 0, newDeaths: 0, newVaccinations: 0 };
}
