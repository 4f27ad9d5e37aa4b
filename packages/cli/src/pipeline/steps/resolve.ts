import { resolveDuplicates, sortChronologically } from '@split-sync/core';
import { describeError } from '@split-sync/shared';
import type { PipelineStep } from '../types.js';
import { debug } from '../../utils/console.js';

/**
 * Step 3: Resolving
 * Drops candidates the budget ledger already holds and anything that
 * collides with another candidate of this run.
 */
export const resolveCandidates: PipelineStep = async (state) => {
    const resolution = resolveDuplicates(state.candidates, state.importedRecords);
    state.resolution = resolution;

    for (const match of resolution.duplicates) {
        debug(`Duplicate (${match.reason}): ${match.candidate.external_id} matches ${match.recordId}`);
    }

    for (const collision of resolution.collisions) {
        state.summary.collisions.push({
            external_id: collision.externalId,
            source_ids: [...collision.sourceIds],
        });
        state.warnings.push(describeError(collision));
    }

    state.summary.duplicates = resolution.duplicates.length;
    state.summary.ambiguous = resolution.ambiguous.length;
    state.selected = sortChronologically(resolution.importable);

    return state;
};
