/**
 * Zod schemas for split-sync data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 * Ledger amounts (amount_minor_units, ImportedRecord.amount) are integer
 * milliunits and are the one exception.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
export const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Integer amount in the budget ledger's milliunits.
 */
const milliunits = z.number().int();

// ============================================================================
// Source Ledger Schemas
// ============================================================================

/**
 * One person's split on an expense.
 */
export const ParticipantSchema = z.object({
    user_id: z.number().int(),
    display_name: z.string(),
    paid_amount: decimalString,
    owed_amount: decimalString,
});

export type Participant = z.infer<typeof ParticipantSchema>;

/**
 * Shared expense, normalized at the source client boundary.
 */
export const RawExpenseSchema = z.object({
    source_id: z.string().min(1),
    description: z.string(),
    total_cost: decimalString,
    currency_code: z.string().length(3),
    occurrence_date: isoDateString,
    deleted: z.boolean(),
    notes: z.string(),
    is_payment: z.boolean(),
    participants: z.array(ParticipantSchema),
});

export type RawExpense = z.infer<typeof RawExpenseSchema>;

/**
 * The user the run is performed for.
 */
export const CurrentUserSchema = z.object({
    id: z.number().int(),
    display_name: z.string(),
    email: z.string().optional(),
});

export type CurrentUser = z.infer<typeof CurrentUserSchema>;

// ============================================================================
// Derivation Schemas
// ============================================================================

/**
 * A participant's paid/owed breakdown and net for one expense.
 * Non-participants carry zeros.
 */
export const ShareResultSchema = z.object({
    is_participant: z.boolean(),
    paid_amount: decimalString,
    owed_amount: decimalString,
    net_amount: decimalString,
});

export type ShareResult = z.infer<typeof ShareResultSchema>;

/**
 * Transaction proposed for the budget ledger.
 */
export const CandidateTransactionSchema = z.object({
    external_id: z.string().min(1),
    source_id: z.string().min(1),
    payee: z.string().min(1),
    amount_minor_units: milliunits,
    memo: z.string(),
    occurrence_date: isoDateString,
    cleared: z.literal('uncleared'),
});

export type CandidateTransaction = z.infer<typeof CandidateTransactionSchema>;

// ============================================================================
// Budget Ledger Schemas
// ============================================================================

/**
 * Existing budget ledger transaction, used only for duplicate comparison.
 */
export const ImportedRecordSchema = z.object({
    id: z.string(),
    external_id: z.string().nullable(),
    amount: milliunits,
    payee: z.string().nullable(),
    occurrence_date: isoDateString,
    memo: z.string().nullable(),
    deleted: z.boolean(),
});

export type ImportedRecord = z.infer<typeof ImportedRecordSchema>;

export const AccountHandleSchema = z.object({
    id: z.string(),
    name: z.string(),
});

export type AccountHandle = z.infer<typeof AccountHandleSchema>;

/**
 * Per-item result of a create-transactions call.
 */
export const ItemOutcomeSchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('accepted'), external_id: z.string(), transaction_id: z.string() }),
    z.object({ status: z.literal('rejected'), external_id: z.string(), reason: z.string() }),
    z.object({ status: z.literal('duplicate'), external_id: z.string() }),
]);

export type ItemOutcome = z.infer<typeof ItemOutcomeSchema>;

// ============================================================================
// Run Summary Schema
// ============================================================================

export const RunStageSchema = z.enum([
    'fetching',
    'deriving',
    'resolving',
    'filtering',
    'importing',
    'done',
    'failed',
]);

export type RunStage = z.infer<typeof RunStageSchema>;

export const RunFailureSchema = z.object({
    source_id: z.string(),
    stage: RunStageSchema,
    reason: z.string(),
});

export type RunFailure = z.infer<typeof RunFailureSchema>;

export const CollisionRecordSchema = z.object({
    external_id: z.string(),
    source_ids: z.array(z.string()),
});

export type CollisionRecord = z.infer<typeof CollisionRecordSchema>;

/**
 * Counts and diagnostics for one run.
 */
export const RunSummarySchema = z.object({
    status: z.enum(['done', 'preview', 'cancelled', 'failed']),
    stage: RunStageSchema,
    fetched: z.number().int().min(0),
    skipped_deleted: z.number().int().min(0),
    skipped_not_participant: z.number().int().min(0),
    skipped_zero_net: z.number().int().min(0),
    candidates: z.number().int().min(0),
    duplicates: z.number().int().min(0),
    ambiguous: z.number().int().min(0),
    deselected: z.number().int().min(0),
    imported: z.number().int().min(0),
    failed: z.number().int().min(0),
    failures: z.array(RunFailureSchema),
    collisions: z.array(CollisionRecordSchema),
});

export type RunSummary = z.infer<typeof RunSummarySchema>;
