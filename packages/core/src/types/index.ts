/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Participant,
    RawExpense,
    CurrentUser,
    ShareResult,
    CandidateTransaction,
    ImportedRecord,
    AccountHandle,
    ItemOutcome,
    RunSummary,
} from '@split-sync/shared';

export {
    IMPORT_ID_PREFIX,
    SINK_LIMITS,
    MILLIUNITS_PER_UNIT,
    MEMO,
    MEMO_MIN_LENGTH,
    SHARE_BALANCE_TOLERANCE,
    DEFAULT_CURRENCY_DECIMALS,
    FALLBACK_PAYEE,
    ValidationError,
    DuplicateCollisionError,
    describeError,
} from '@split-sync/shared';
