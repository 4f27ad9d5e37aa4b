import type { CandidateTransaction, ShareResult } from '../types/index.js';

/**
 * Field limits applied while building candidates.
 */
export interface DeriveOptions {
    memoMaxLength?: number;
    payeeMaxLength?: number;
}

/**
 * What became of one expense.
 */
export type DerivationOutcome =
    | { kind: 'deleted'; sourceId: string }
    | { kind: 'not_participant'; sourceId: string }
    | { kind: 'zero_net'; sourceId: string; share: ShareResult }
    | { kind: 'candidate'; sourceId: string; share: ShareResult; candidate: CandidateTransaction };

/**
 * An expense that could not be derived.
 */
export interface DerivationFailure {
    sourceId: string;
    reason: string;
    error: unknown;
}

export interface DerivationStats {
    deleted: number;
    notParticipant: number;
    zeroNet: number;
}

/**
 * Result of deriving a batch of expenses.
 */
export interface DerivationResult {
    candidates: CandidateTransaction[];
    failures: DerivationFailure[];
    stats: DerivationStats;
}
