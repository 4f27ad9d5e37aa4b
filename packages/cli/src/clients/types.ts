import type {
    AccountHandle,
    CandidateTransaction,
    CurrentUser,
    ImportedRecord,
    ItemOutcome,
    RawExpense,
} from '@split-sync/shared';

/**
 * A source record that failed boundary validation.
 */
export interface InvalidExpense {
    sourceId: string;
    reason: string;
}

export interface FetchedExpenses {
    expenses: RawExpense[];
    invalid: InvalidExpense[];
}

/**
 * Shared-expense ledger (read side).
 */
export interface ExpenseSource {
    getCurrentUser(): Promise<CurrentUser>;
    /** All expenses dated on or after `since` (YYYY-MM-DD), every page. */
    fetchExpenses(since: string): Promise<FetchedExpenses>;
}

/**
 * Budget ledger (read and write side).
 */
export interface BudgetSink {
    /** @throws AccountNotFoundError */
    findAccount(name: string): Promise<AccountHandle>;
    fetchAccountTransactions(account: AccountHandle, since: string): Promise<ImportedRecord[]>;
    /** One outcome per candidate, in candidate order. */
    createTransactions(account: AccountHandle, candidates: readonly CandidateTransaction[]): Promise<ItemOutcome[]>;
}
