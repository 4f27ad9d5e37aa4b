import { describeError, type RunStage, type RunSummary } from '@split-sync/shared';
import type { PipelineCollaborators, PipelineState, PipelineStep } from './types.js';
import { fetchLedgers } from './steps/fetch.js';
import { deriveCandidates } from './steps/derive.js';
import { resolveCandidates } from './steps/resolve.js';
import { filterCandidates } from './steps/filter.js';
import { importCandidates } from './steps/import.js';
import type { SyncConfig } from '../types.js';
import { arrow, debug, error } from '../utils/console.js';

interface StageDefinition {
    stage: RunStage;
    name: string;
    fn: PipelineStep;
    skip?: (state: PipelineState) => boolean;
}

const STAGES: StageDefinition[] = [
    { stage: 'fetching', name: 'Fetching', fn: fetchLedgers },
    { stage: 'deriving', name: 'Deriving', fn: deriveCandidates },
    { stage: 'resolving', name: 'Duplicate Resolution', fn: resolveCandidates },
    { stage: 'filtering', name: 'Filtering', fn: filterCandidates, skip: (s) => s.config.skipFilter },
    { stage: 'importing', name: 'Importing', fn: importCandidates, skip: (s) => s.config.dryRun },
];

export function createSummary(): RunSummary {
    return {
        status: 'done',
        stage: 'fetching',
        fetched: 0,
        skipped_deleted: 0,
        skipped_not_participant: 0,
        skipped_zero_net: 0,
        candidates: 0,
        duplicates: 0,
        ambiguous: 0,
        deselected: 0,
        imported: 0,
        failed: 0,
        failures: [],
        collisions: [],
    };
}

/**
 * Orchestrates one sync run.
 * Runs each stage sequentially, stopping on a fatal error or a cancel.
 * The returned state carries the finalized summary.
 */
export async function runPipeline(
    config: SyncConfig,
    collaborators: PipelineCollaborators
): Promise<PipelineState> {
    let state: PipelineState = {
        config,
        collaborators,
        stage: 'fetching',
        expenses: [],
        invalidExpenses: [],
        importedRecords: [],
        candidates: [],
        selected: [],
        outcomes: [],
        cancelled: false,
        summary: createSummary(),
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < STAGES.length; i++) {
        const step = STAGES[i];
        if (step.skip?.(state)) {
            debug(`Skipping step "${step.name}"`);
            continue;
        }

        state.stage = step.stage;
        arrow(`Step ${i + 1}/${STAGES.length}: ${step.name}...`);

        try {
            state = await step.fn(state);
        } catch (err) {
            state.errors.push({ stage: step.stage, message: describeError(err), fatal: true, error: err });
        }

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
        if (state.cancelled) {
            break;
        }
    }

    return finalize(state);
}

function finalize(state: PipelineState): PipelineState {
    const { summary } = state;
    summary.stage = state.stage;

    if (state.errors.some(e => e.fatal)) {
        summary.status = 'failed';
        state.stage = 'failed';
    } else if (state.cancelled) {
        summary.status = 'cancelled';
    } else if (state.config.dryRun) {
        summary.status = 'preview';
        summary.stage = 'done';
        state.stage = 'done';
    } else {
        summary.status = 'done';
        summary.stage = 'done';
        state.stage = 'done';
    }

    return state;
}
