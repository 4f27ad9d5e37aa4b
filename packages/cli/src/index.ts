#!/usr/bin/env node
/**
 * split-sync CLI
 *
 * The CLI owns all I/O (network, terminal, config files); the core package
 * only derives and resolves transactions.
 */

import { parseCliArgs, USAGE, type ParsedArgs } from './args.js';
import { syncExpenses } from './commands/sync.js';

async function main(): Promise<void> {
    let parsed: ParsedArgs;
    try {
        parsed = parseCliArgs(process.argv.slice(2));
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        console.error('');
        console.error(USAGE);
        process.exit(1);
    }

    if (parsed.command === 'help') {
        console.log(USAGE);
        process.exit(0);
    }

    const code = await syncExpenses(parsed.options);
    process.exit(code);
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
