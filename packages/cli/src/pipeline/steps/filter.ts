import { applySelection } from '@split-sync/core';
import { describeError } from '@split-sync/shared';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Filtering
 * Lets the selector narrow the importable candidates. A cancel ends the
 * run before anything is written.
 */
export const filterCandidates: PipelineStep = async (state) => {
    const { selector } = state.collaborators;
    if (!selector || state.selected.length === 0) {
        return state;
    }

    try {
        const selection = await selector.select(state.selected);
        const result = applySelection(state.selected, selection);

        state.summary.deselected = result.deselected;
        state.selected = result.selected;
        state.cancelled = result.cancelled;
    } catch (err) {
        state.errors.push({
            stage: 'filtering',
            message: `Selection failed: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
