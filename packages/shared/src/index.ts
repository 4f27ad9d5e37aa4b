// Schemas
export {
    isoDateString,
    decimalString,
    ParticipantSchema,
    RawExpenseSchema,
    CurrentUserSchema,
    ShareResultSchema,
    CandidateTransactionSchema,
    ImportedRecordSchema,
    AccountHandleSchema,
    ItemOutcomeSchema,
    RunStageSchema,
    RunFailureSchema,
    CollisionRecordSchema,
    RunSummarySchema,
} from './schemas.js';

// Types
export type {
    Participant,
    RawExpense,
    CurrentUser,
    ShareResult,
    CandidateTransaction,
    ImportedRecord,
    AccountHandle,
    ItemOutcome,
    RunStage,
    RunFailure,
    CollisionRecord,
    RunSummary,
} from './schemas.js';

// Constants
export {
    IMPORT_ID_PREFIX,
    SINK_LIMITS,
    MILLIUNITS_PER_UNIT,
    MEMO,
    MEMO_MIN_LENGTH,
    SHARE_BALANCE_TOLERANCE,
    DEFAULT_CURRENCY_DECIMALS,
    FALLBACK_PAYEE,
    SYNC_DEFAULTS,
} from './constants.js';

// Errors
export {
    SyncError,
    ConfigurationError,
    AccountNotFoundError,
    TransportError,
    ValidationError,
    DuplicateCollisionError,
    SinkRejection,
    describeError,
} from './errors.js';
