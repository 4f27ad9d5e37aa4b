import { parseArgs } from 'node:util';
import type { SyncOptions } from './types.js';

export const USAGE = [
    'Usage: split-sync [options]',
    '',
    'Import your share of Splitwise expenses into a YNAB account.',
    '',
    'Options:',
    '  --start-date <YYYY-MM-DD>  Import expenses dated on or after this day (prompted if omitted)',
    '  --dry-run                  Preview the transactions without writing to YNAB',
    '  --skip-filter              Import every new transaction without the selection menu',
    '  --yes, -y                  Do not ask for confirmation before importing',
    '  --verbose, -v              Print debug output',
    '  --config <path>            Use this split-sync.yaml instead of searching for one',
    '  --account <name>           YNAB account to import into (default "Splitwise (Wallet)")',
    '  --help, -h                 Show this help',
    '',
    'Environment:',
    '  SPLITWISE_API_KEY, YNAB_ACCESS_TOKEN (required)',
    '  YNAB_ACCOUNT_NAME, YNAB_BUDGET_ID, SPLITWISE_API_URL, YNAB_API_URL',
].join('\n');

export type ParsedArgs =
    | { command: 'help' }
    | { command: 'sync'; options: SyncOptions };

/**
 * Parse command-line flags.
 *
 * @throws TypeError for unknown flags or a missing flag value
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
    const { values } = parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            'start-date': { type: 'string' },
            'dry-run': { type: 'boolean', default: false },
            'skip-filter': { type: 'boolean', default: false },
            yes: { type: 'boolean', short: 'y', default: false },
            verbose: { type: 'boolean', short: 'v', default: false },
            config: { type: 'string' },
            account: { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    if (values.help) {
        return { command: 'help' };
    }

    return {
        command: 'sync',
        options: {
            startDate: values['start-date'],
            dryRun: values['dry-run'] ?? false,
            skipFilter: values['skip-filter'] ?? false,
            yes: values.yes ?? false,
            verbose: values.verbose ?? false,
            config: values.config,
            account: values.account,
        },
    };
}
