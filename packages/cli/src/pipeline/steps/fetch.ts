import { addDays } from '@split-sync/core';
import { describeError } from '@split-sync/shared';
import type { PipelineStep } from '../types.js';
import { debug } from '../../utils/console.js';

/**
 * Step 1: Fetching
 * Loads the current user, the target account, every expense since the start
 * date and the account's existing transactions. Any failure here is fatal.
 */
export const fetchLedgers: PipelineStep = async (state) => {
    const { config, collaborators } = state;
    const { source, sink } = collaborators;

    try {
        state.user = await source.getCurrentUser();
        debug(`Running as ${state.user.display_name} (id ${state.user.id})`);

        state.account = await sink.findAccount(config.accountName);
        debug(`Target account: ${state.account.name} (${state.account.id})`);

        const fetched = await source.fetchExpenses(config.startDate);
        state.expenses = fetched.expenses;
        state.invalidExpenses = fetched.invalid;
        state.summary.fetched = fetched.expenses.length + fetched.invalid.length;

        // Look further back than the start date: a matching transaction may
        // have been entered by hand a few days earlier.
        const since = addDays(config.startDate, -config.lookbackDays);
        state.importedRecords = await sink.fetchAccountTransactions(state.account, since);
    } catch (err) {
        state.errors.push({
            stage: 'fetching',
            message: describeError(err),
            fatal: true,
            error: err,
        });
        return state;
    }

    if (state.summary.fetched === 0) {
        state.warnings.push(`No expenses found since ${config.startDate}.`);
    }

    return state;
};
