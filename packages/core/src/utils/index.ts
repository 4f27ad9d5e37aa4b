export { parseIsoDate, toIsoDate, formatIsoDate, isValidDate } from './date-parse.js';
export { addDays } from './date-diff.js';
export { currencyDecimals, formatCurrency } from './currency.js';
export { clipText } from './text.js';
