import { DEFAULT_CURRENCY_DECIMALS } from '../types/index.js';

/**
 * Minor-unit precision for an ISO 4217 code (USD → 2, JPY → 0).
 * Malformed codes fall back to two decimals.
 */
export function currencyDecimals(currencyCode: string): number {
    try {
        return currencyFormatter(currencyCode).resolvedOptions().maximumFractionDigits;
    } catch (err) {
        if (err instanceof RangeError) return DEFAULT_CURRENCY_DECIMALS;
        throw err;
    }
}

/**
 * Display an amount in its currency: formatCurrency('12.5', 'USD') → "$12.50".
 */
export function formatCurrency(amount: string, currencyCode: string): string {
    try {
        return currencyFormatter(currencyCode).format(Number(amount));
    } catch (err) {
        if (err instanceof RangeError) return `${amount} ${currencyCode}`;
        throw err;
    }
}

function currencyFormatter(currencyCode: string): Intl.NumberFormat {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency: currencyCode });
}
