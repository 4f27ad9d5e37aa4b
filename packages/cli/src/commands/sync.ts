import { SyncError, describeError } from '@split-sync/shared';
import { loadConfig } from '../config/load.js';
import { SplitwiseClient } from '../clients/splitwise.js';
import { YnabClient } from '../clients/ynab.js';
import { runPipeline } from '../pipeline/runner.js';
import type { CandidateSelector, PipelineCollaborators, PipelineState } from '../pipeline/types.js';
import { ask, promptContinue, promptSelection } from '../utils/prompt.js';
import { formatCandidateTable, formatSummaryCounts } from '../utils/preview.js';
import { log, success, warn, error, info, arrow, setVerbose } from '../utils/console.js';
import type { SyncConfig, SyncOptions } from '../types.js';

/**
 * Selector backed by the terminal: shows the numbered candidates, then the
 * filter menu; confirms before writing unless --yes.
 */
export function createTerminalSelector(config: SyncConfig): CandidateSelector {
    return {
        async select(candidates) {
            log(`\nFound ${candidates.length} transaction(s) to import:\n`);
            formatCandidateTable(candidates).forEach(log);
            return promptSelection(candidates.length);
        },
        async confirm(count) {
            return promptContinue(`\nImport ${count} transaction(s) into '${config.accountName}'?`, config.assumeYes);
        },
    };
}

export function createCollaborators(config: SyncConfig): PipelineCollaborators {
    return {
        source: new SplitwiseClient({
            apiUrl: config.splitwise.apiUrl,
            apiKey: config.splitwise.apiKey,
            timeoutMs: config.requestTimeoutMs,
        }),
        sink: new YnabClient({
            apiUrl: config.ynab.apiUrl,
            accessToken: config.ynab.accessToken,
            budgetId: config.budgetId,
            timeoutMs: config.requestTimeoutMs,
        }),
        selector: createTerminalSelector(config),
    };
}

/**
 * Runs one sync and prints the summary. Resolves with the process exit code.
 */
export async function syncExpenses(options: SyncOptions): Promise<number> {
    setVerbose(options.verbose);
    log('\nsplit-sync - Splitwise to YNAB');

    if (!options.startDate && process.stdin.isTTY) {
        options = { ...options, startDate: await ask('Import expenses since (YYYY-MM-DD):') };
    }

    let config: SyncConfig;
    try {
        config = loadConfig({ options });
    } catch (err) {
        if (err instanceof SyncError) {
            error(`Error: ${describeError(err)}`);
            return 1;
        }
        throw err;
    }

    if (config.configPath) {
        info(`Config: ${config.configPath}`);
    }
    arrow(`Syncing expenses since ${config.startDate} into '${config.accountName}'`);
    if (config.dryRun) {
        info('Dry run: nothing will be written to YNAB.');
    }

    const state = await runPipeline(config, createCollaborators(config));
    printReport(state);

    return state.summary.status === 'failed' ? 1 : 0;
}

/**
 * Terminal summary. Always prints the counts, even after a failure.
 */
export function printReport(state: PipelineState): void {
    const { summary } = state;

    log('\n--- Sync Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (summary.status === 'preview' && state.selected.length > 0) {
        log('\nWould import:');
        formatCandidateTable(state.selected).forEach(log);
        log('');
    }

    formatSummaryCounts(summary).forEach(arrow);

    if (summary.failures.length > 0) {
        log('\nFailures:');
        for (const failure of summary.failures) {
            error(`[${failure.stage}] Expense ${failure.source_id}: ${failure.reason}`);
        }
    }

    for (const e of state.errors) {
        if (e.fatal) {
            error(`ERROR [${e.stage}]: ${e.message}`);
        }
    }

    switch (summary.status) {
        case 'failed':
            log('\n✖ Sync failed.');
            break;
        case 'cancelled':
            log('\nImport cancelled. Nothing was written.');
            break;
        case 'preview':
            log('\n[DRY RUN] No transactions were written.');
            break;
        case 'done':
            if (summary.imported === 0 && summary.failed === 0) {
                success('Nothing new to import.');
            } else {
                success(`Imported ${summary.imported} transaction(s).`);
            }
            break;
    }
}
