import { describe, it, expect } from 'vitest';
import { currencyDecimals, formatCurrency } from '../../src/utils/currency.js';

describe('currency utilities', () => {
    it('knows minor-unit precision per currency', () => {
        expect(currencyDecimals('USD')).toBe(2);
        expect(currencyDecimals('JPY')).toBe(0);
    });

    it('falls back to two decimals for malformed codes', () => {
        expect(currencyDecimals('DOLLARS')).toBe(2);
    });

    it('formats amounts with the currency symbol', () => {
        expect(formatCurrency('12.5', 'USD')).toBe('$12.50');
        expect(formatCurrency('1234', 'USD')).toBe('$1,234.00');
    });

    it('falls back to amount and code for malformed codes', () => {
        expect(formatCurrency('12.5', 'DOLLARS')).toBe('12.5 DOLLARS');
    });
});
