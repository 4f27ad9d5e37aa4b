/**
 * Constants for split-sync.
 */

/**
 * Prefix for every import id this tool writes to the budget ledger.
 * Namespaces our ids away from file imports and other sync tools
 * sharing the same account.
 */
export const IMPORT_ID_PREFIX = 'splitwise_';

/**
 * Budget ledger field limits.
 */
export const SINK_LIMITS = {
    MEMO_MAX_LENGTH: 500,
    PAYEE_MAX_LENGTH: 200,
    IMPORT_ID_MAX_LENGTH: 36,
} as const;

/**
 * The budget ledger stores amounts as integer milliunits ($1.00 = 1000).
 */
export const MILLIUNITS_PER_UNIT = 1000;

/**
 * Memo rendering.
 */
export const MEMO = {
    DELIMITER: ' | ',
    ELLIPSIS: '...',
    SOURCE_LABEL: 'Splitwise ID',
    PAYMENT_LABEL: 'Settle-up payment',
} as const;

/**
 * Smallest memo cap that still holds the longest possible source id segment.
 */
export const MEMO_MIN_LENGTH =
    MEMO.SOURCE_LABEL.length + ': '.length + (SINK_LIMITS.IMPORT_ID_MAX_LENGTH - IMPORT_ID_PREFIX.length);

/**
 * Allowed drift between participant share sums and the expense total.
 * Splitwise rounds uneven splits to the cent, so sums can be off by one.
 */
export const SHARE_BALANCE_TOLERANCE = '0.01';

/**
 * Minor-unit precision used when a currency code is unknown to Intl.
 */
export const DEFAULT_CURRENCY_DECIMALS = 2;

/**
 * Payee used when an expense has a blank description.
 */
export const FALLBACK_PAYEE = 'Unknown Expense';

/**
 * Run defaults.
 */
export const SYNC_DEFAULTS = {
    ACCOUNT_NAME: 'Splitwise (Wallet)',
    BUDGET_ID: 'last-used',
    SPLITWISE_API_URL: 'https://secure.splitwise.com/api/v3.0',
    YNAB_API_URL: 'https://api.ynab.com/v1',
    IMPORT_BATCH_SIZE: 100,
    LOOKBACK_DAYS: 30,
    SOURCE_PAGE_SIZE: 100,
    REQUEST_TIMEOUT_MS: 10_000,
} as const;
