import { createInterface } from 'node:readline';
import { parsePositions, toIndexPredicate, type Selection } from '@split-sync/core';
import { describeError, ValidationError } from '@split-sync/shared';
import { error } from './console.js';

/**
 * Asks one question on the terminal and resolves with the trimmed answer.
 */
export async function ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
        rl.question(`${question} `, (answer) => {
            rl.close();
            resolve(answer.trim());
        });
    });
}

/**
 * Prompts the user for confirmation if in a TTY.
 * If assumeYes is set, returns true automatically.
 * If not a TTY and assumeYes is not set, returns false.
 */
export async function promptContinue(message: string, assumeYes: boolean): Promise<boolean> {
    if (assumeYes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to continue.');
        return false;
    }

    const answer = await ask(`${message} [y/N]`);
    return answer.toLowerCase() === 'y';
}

export const SELECTION_MENU = [
    'How would you like to filter?',
    '1. Import all transactions',
    '2. Import transactions before a position',
    '3. Import transactions after a position',
    '4. Import a range of positions',
    '5. Import specific positions (e.g. 2,3 or 1-4)',
    '6. Cancel import',
].join('\n');

function singlePosition(answer: string, count: number): number {
    const tokens = answer.split(/[\s,]+/).filter(t => t.length > 0);
    if (tokens.length > 1 || tokens.some(t => !/^\d+$/.test(t))) {
        throw new ValidationError(`Enter a single position, got "${answer.trim()}"`);
    }
    return parsePositions(answer, count)[0];
}

/**
 * Turn a menu choice and its follow-up answer into a Selection.
 *
 * @throws ValidationError for out-of-range or malformed positions
 */
export function selectionFromAnswers(choice: string, answer: string, count: number): Selection {
    let selection: Selection;
    switch (choice) {
        case '1':
            return { mode: 'all' };
        case '6':
            return { mode: 'cancel' };
        case '2':
            selection = { mode: 'before', position: singlePosition(answer, count) };
            break;
        case '3':
            selection = { mode: 'after', position: singlePosition(answer, count) };
            break;
        case '4': {
            const parts = answer.split('-');
            if (parts.length > 2) {
                throw new ValidationError(`Invalid range "${answer.trim()}"`);
            }
            const from = singlePosition(parts[0], count);
            const to = parts.length === 2 ? singlePosition(parts[1], count) : from;
            selection = { mode: 'range', from, to };
            break;
        }
        case '5':
            selection = { mode: 'list', positions: parsePositions(answer, count) };
            break;
        default:
            throw new RangeError(`Unknown menu choice: ${choice}`);
    }

    // Surface range errors here so the caller can re-ask.
    toIndexPredicate(selection, count);
    return selection;
}

const FOLLOW_UP: Record<string, string> = {
    '2': 'Import positions BEFORE which number?',
    '3': 'Import positions AFTER which number?',
    '4': 'Range to import (e.g. 2-5)?',
    '5': 'Positions to import?',
};

/**
 * Interactive menu over `count` numbered candidates. Re-asks until the
 * answer is valid. Non-interactive sessions cancel.
 */
export async function promptSelection(count: number): Promise<Selection> {
    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --skip-filter to import without selecting.');
        return { mode: 'cancel' };
    }

    while (true) {
        const choice = await ask(`\n${SELECTION_MENU}\nEnter choice (1-6):`);
        if (!/^[1-6]$/.test(choice)) {
            error(`Invalid choice "${choice}". Enter a number from 1 to 6.`);
            continue;
        }

        const followUp = FOLLOW_UP[choice];
        const answer = followUp ? await ask(followUp) : '';
        try {
            return selectionFromAnswers(choice, answer, count);
        } catch (err) {
            error(describeError(err));
        }
    }
}
