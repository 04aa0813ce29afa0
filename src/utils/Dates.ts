const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD string to midnight UTC.
 * Returns null for anything else, including impossible dates like 2023-02-30.
 */
export function parseIsoDate(value: string): Date | null {
    const match = ISO_DATE.exec(value.trim());
    if (!match) {
        return null;
    }
    const date = new Date(`${match[1]}-${match[2]}-${match[3]}T00:00:00Z`);
    if (Number.isNaN(date.getTime()) || formatIsoDate(date) !== match[0]) {
        return null;
    }
    return date;
}

export function formatIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/** YYYYMMDD, used in export file names */
export function formatCompactDate(date: Date): string {
    return formatIsoDate(date).replace(/-/g, '');
}
