/**
 * Date parsing utilities.
 * All dates are calendar dates in UTC (00:00:00Z).
 */

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1]);
    const month = parseInt(match[2]);
    const day = parseInt(match[3]);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert an ISO 8601 timestamp ("2024-01-15T10:30:00Z") or plain date
 * to its UTC calendar date.
 */
export function toIsoDate(value: string): string | null {
    if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return parseIsoDate(value) ? value : null;
    }

    // Only accept timestamps that carry a date part; Date() parses far too much.
    if (!/^\d{4}-\d{2}-\d{2}T/.test(value)) return null;

    const date = new Date(value);
    return isValidDate(date) ? formatIsoDate(date) : null;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
