import type {
    AccountHandle,
    CandidateTransaction,
    CurrentUser,
    ImportedRecord,
    ItemOutcome,
    RawExpense,
    RunStage,
    RunSummary,
} from '@split-sync/shared';
import type { Resolution, Selection } from '@split-sync/core';
import type { BudgetSink, ExpenseSource, InvalidExpense } from '../clients/types.js';
import type { SyncConfig } from '../types.js';

/**
 * Chooses which candidates to import. `select` receives the importable
 * candidates in chronological order, numbered 1..n.
 */
export interface CandidateSelector {
    select(candidates: readonly CandidateTransaction[]): Promise<Selection>;
    /** Final go/no-go before anything is written. Absent means go. */
    confirm?(count: number): Promise<boolean>;
}

export interface PipelineCollaborators {
    source: ExpenseSource;
    sink: BudgetSink;
    selector?: CandidateSelector;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    stage: RunStage;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the sync pipeline.
 * Only the pipeline steps mutate it, one step at a time.
 */
export interface PipelineState {
    config: SyncConfig;
    collaborators: PipelineCollaborators;
    stage: RunStage;

    // Accumulated during pipeline execution
    user?: CurrentUser;
    account?: AccountHandle;
    expenses: RawExpense[];
    invalidExpenses: InvalidExpense[];
    importedRecords: ImportedRecord[];
    candidates: CandidateTransaction[];
    resolution?: Resolution;
    /** Chronological; narrowed by FILTERING, consumed by IMPORTING. */
    selected: CandidateTransaction[];
    outcomes: ItemOutcome[];
    cancelled: boolean;

    summary: RunSummary;
    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
