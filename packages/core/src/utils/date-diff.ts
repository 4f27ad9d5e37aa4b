/**
 * Date arithmetic utilities using native Date.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Shift an ISO date by a whole number of days (negative goes back).
 */
export function addDays(date: string, days: number): string {
    const d = new Date(date + 'T00:00:00Z');
    return new Date(d.getTime() + days * MS_PER_DAY).toISOString().slice(0, 10);
}
