import { ascending, extent } from 'd3-array';

import { NoDataInRangeError } from '../model/Errors.ts';

import type {
    DateSpan,
    Dataset,
    DerivedDataset,
    DerivedObservation,
    FilteredView,
} from '../model/Models.ts';

/**
 * Rows of one location within [start, end] (inclusive), sorted by date.
 * Location match is exact and case-sensitive. Rows and their attribute
 * maps are copied, so the view can be mutated freely.
 */
export function filterDataset(
    dataset: DerivedDataset,
    location: string,
    start: Date,
    end: Date
): FilteredView {
    const from = start.getTime();
    const to = end.getTime();

    const rows = dataset.rows
        .filter((row) => {
            const t = row.date.getTime();
            return row.location === location && t >= from && t <= to;
        })
        .map(copyRow)
        // Array.prototype.sort is stable, equal dates keep source order
        .sort((a, b) => ascending(a.date.getTime(), b.date.getTime()));

    return { location, start: new Date(from), end: new Date(to), rows };
}

/**
 * Most recent row of the view.
 * @throws NoDataInRangeError when the view is empty
 */
export function latestRow(view: FilteredView): DerivedObservation {
    const last = view.rows.at(-1);
    if (!last) {
        throw new NoDataInRangeError(view.location, view.start, view.end);
    }
    return last;
}

export function isEmpty(view: FilteredView): boolean {
    return view.rows.length === 0;
}

/** Sorted unique location names */
export function listLocations(dataset: Dataset): string[] {
    return Array.from(new Set(dataset.rows.map((row) => row.location))).sort(ascending);
}

/**
 * First and last observed dates, or null for an empty dataset
 */
export function dateSpan(dataset: Dataset): DateSpan | null {
    const [min, max] = extent(dataset.rows, (row) => row.date.getTime());
    if (min === undefined || max === undefined) {
        return null;
    }
    return { start: new Date(min), end: new Date(max) };
}

function copyRow(row: DerivedObservation): DerivedObservation {
    return { ...row, date: new Date(row.date.getTime()), attributes: { ...row.attributes } };
}
