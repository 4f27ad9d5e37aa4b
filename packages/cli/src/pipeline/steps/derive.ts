import { deriveTransactions } from '@split-sync/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Deriving
 * Turns each expense into a candidate transaction for the current user.
 * A bad expense is counted as failed and the run continues.
 */
export const deriveCandidates: PipelineStep = async (state) => {
    const { user, config, summary } = state;
    if (!user) {
        state.errors.push({ stage: 'deriving', message: 'No current user loaded.', fatal: true });
        return state;
    }

    // Expenses the source client could not parse
    for (const invalid of state.invalidExpenses) {
        summary.failures.push({ source_id: invalid.sourceId, stage: 'deriving', reason: invalid.reason });
    }

    const result = deriveTransactions(state.expenses, user.id, { memoMaxLength: config.memoMaxLength });

    for (const failure of result.failures) {
        summary.failures.push({ source_id: failure.sourceId, stage: 'deriving', reason: failure.reason });
        state.errors.push({
            stage: 'deriving',
            message: `Expense ${failure.sourceId}: ${failure.reason}`,
            fatal: false,
            error: failure.error,
        });
    }

    state.candidates = result.candidates;
    summary.skipped_deleted = result.stats.deleted;
    summary.skipped_not_participant = result.stats.notParticipant;
    summary.skipped_zero_net = result.stats.zeroNet;
    summary.candidates = result.candidates.length;
    summary.failed += state.invalidExpenses.length + result.failures.length;

    return state;
};
