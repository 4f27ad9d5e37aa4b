// Types (re-exported from shared)
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
} from './types/index.js';

// Utils
export {
    parseIsoDate,
    toIsoDate,
    formatIsoDate,
    isValidDate,
    addDays,
    currencyDecimals,
    formatCurrency,
    clipText,
} from './utils/index.js';

// Share calculation
export { calculateShare, toMinorUnits } from './share/index.js';

// Memo
export { formatMemo } from './memo/index.js';
export type { MemoInput } from './memo/index.js';

// Import ids
export { generateImportId, isImportId } from './identity/index.js';

// Derivation
export { deriveTransaction, deriveTransactions } from './derive/index.js';
export type {
    DeriveOptions,
    DerivationOutcome,
    DerivationFailure,
    DerivationStats,
    DerivationResult,
} from './derive/index.js';

// Duplicate resolution
export { resolveDuplicates } from './dedup/index.js';
export type { DuplicateReason, DuplicateMatch, Resolution } from './dedup/index.js';

// Selection
export { applySelection, toIndexPredicate, parsePositions, sortChronologically } from './selection/index.js';
export type { Selection, IndexPredicate, SelectionResult } from './selection/index.js';
