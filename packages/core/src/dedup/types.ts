import type { CandidateTransaction, DuplicateCollisionError } from '../types/index.js';

/**
 * import_id: the ledger already holds a transaction with the same import id.
 * content: same amount, date and payee as a transaction without our import id.
 */
export type DuplicateReason = 'import_id' | 'content';

export interface DuplicateMatch {
    candidate: CandidateTransaction;
    reason: DuplicateReason;
    recordId: string;
}

/**
 * Candidates partitioned by duplicate status. The three lists are disjoint
 * and keep the input order.
 */
export interface Resolution {
    importable: CandidateTransaction[];
    duplicates: DuplicateMatch[];
    ambiguous: CandidateTransaction[];
    collisions: DuplicateCollisionError[];
}
