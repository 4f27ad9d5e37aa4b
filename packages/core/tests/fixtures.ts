import type { CandidateTransaction, ImportedRecord, RawExpense } from '../src/types/index.js';

export const USER_ID = 100;
export const FRIEND_ID = 200;

/**
 * Two-person expense in USD. Override any field per test.
 */
export function makeExpense(overrides: Partial<RawExpense> = {}): RawExpense {
    return {
        source_id: '501',
        description: 'Groceries',
        total_cost: '25.00',
        currency_code: 'USD',
        occurrence_date: '2024-01-15',
        deleted: false,
        notes: '',
        is_payment: false,
        participants: [
            { user_id: USER_ID, display_name: 'Alex Doe', paid_amount: '25.00', owed_amount: '12.50' },
            { user_id: FRIEND_ID, display_name: 'Sam Lee', paid_amount: '0.00', owed_amount: '12.50' },
        ],
        ...overrides,
    };
}

export function makeCandidate(overrides: Partial<CandidateTransaction> = {}): CandidateTransaction {
    const sourceId = overrides.source_id ?? '501';
    return {
        external_id: `splitwise_${sourceId}`,
        source_id: sourceId,
        payee: 'Groceries',
        amount_minor_units: 12500,
        memo: `Splitwise ID: ${sourceId}`,
        occurrence_date: '2024-01-15',
        cleared: 'uncleared',
        ...overrides,
    };
}

export function makeRecord(overrides: Partial<ImportedRecord> = {}): ImportedRecord {
    return {
        id: 'txn-1',
        external_id: null,
        amount: 12500,
        payee: 'Groceries',
        occurrence_date: '2024-01-15',
        memo: null,
        deleted: false,
        ...overrides,
    };
}
