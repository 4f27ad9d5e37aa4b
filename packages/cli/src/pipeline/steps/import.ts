import {
    SinkRejection,
    TransportError,
    describeError,
    type AccountHandle,
    type CandidateTransaction,
    type ItemOutcome,
} from '@split-sync/shared';
import type { BudgetSink } from '../../clients/types.js';
import type { PipelineState, PipelineStep } from '../types.js';
import { debug } from '../../utils/console.js';

/**
 * Step 5: Importing
 * Submits the selected candidates in batches. Per-item rejections are
 * recorded and their siblings still go through; a transport failure marks
 * everything not yet settled as failed and stops the run.
 */
export const importCandidates: PipelineStep = async (state) => {
    const { account, config } = state;
    const { sink, selector } = state.collaborators;

    if (state.selected.length === 0) {
        return state;
    }
    if (!account) {
        state.errors.push({ stage: 'importing', message: 'No target account loaded.', fatal: true });
        return state;
    }

    if (selector?.confirm) {
        const proceed = await selector.confirm(state.selected.length);
        if (!proceed) {
            state.cancelled = true;
            return state;
        }
    }

    const settled = new Set<string>();
    const record = (outcome: ItemOutcome): void => {
        settled.add(outcome.external_id);
        recordOutcome(state, outcome);
    };

    const batches = chunk(state.selected, config.importBatchSize);
    for (let i = 0; i < batches.length; i++) {
        debug(`Submitting batch ${i + 1}/${batches.length} (${batches[i].length} transactions)`);
        try {
            await submitBatch(sink, account, batches[i], record);
        } catch (err) {
            const reason = describeError(err);
            const unsettled = state.selected.filter(c => !settled.has(c.external_id));
            for (const candidate of unsettled) {
                state.summary.failures.push({ source_id: candidate.source_id, stage: 'importing', reason });
            }
            state.summary.failed += unsettled.length;
            state.errors.push({
                stage: 'importing',
                message: `Import aborted, ${unsettled.length} transaction(s) not imported: ${reason}`,
                fatal: true,
                error: err,
            });
            return state;
        }
    }

    return state;
};

/**
 * Submit one batch. When the sink refuses the batch as a whole, resubmit it
 * one transaction at a time so only the offending items fail.
 */
async function submitBatch(
    sink: BudgetSink,
    account: AccountHandle,
    batch: readonly CandidateTransaction[],
    record: (outcome: ItemOutcome) => void
): Promise<void> {
    try {
        const outcomes = await sink.createTransactions(account, batch);
        outcomes.forEach(record);
        return;
    } catch (err) {
        if (!isBatchRejection(err)) throw err;
        if (batch.length === 1) {
            record({ status: 'rejected', external_id: batch[0].external_id, reason: describeError(err) });
            return;
        }
        debug(`Batch of ${batch.length} refused, resubmitting one at a time`);
    }

    for (const candidate of batch) {
        try {
            const outcomes = await sink.createTransactions(account, [candidate]);
            outcomes.forEach(record);
        } catch (err) {
            if (!isBatchRejection(err)) throw err;
            record({ status: 'rejected', external_id: candidate.external_id, reason: describeError(err) });
        }
    }
}

function isBatchRejection(err: unknown): boolean {
    return err instanceof TransportError && err.status === 400;
}

function recordOutcome(state: PipelineState, outcome: ItemOutcome): void {
    state.outcomes.push(outcome);
    const { summary } = state;

    switch (outcome.status) {
        case 'accepted':
            summary.imported += 1;
            break;
        case 'duplicate':
            summary.duplicates += 1;
            break;
        case 'rejected': {
            const rejection = new SinkRejection(outcome.external_id, outcome.reason);
            const candidate = state.selected.find(c => c.external_id === outcome.external_id);
            summary.failed += 1;
            summary.failures.push({
                source_id: candidate?.source_id ?? outcome.external_id,
                stage: 'importing',
                reason: outcome.reason,
            });
            state.errors.push({ stage: 'importing', message: rejection.message, fatal: false, error: rejection });
            break;
        }
    }
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}
