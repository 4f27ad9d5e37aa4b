import { ValidationError } from '../types/index.js';
import type { IndexPredicate, Selection, SelectionResult } from './types.js';

/**
 * Stable sort by occurrence date, oldest first.
 * Returns a new array; equal dates keep their input order.
 */
export function sortChronologically<T extends { occurrence_date: string }>(items: readonly T[]): T[] {
    return [...items].sort((a, b) =>
        a.occurrence_date < b.occurrence_date ? -1 : a.occurrence_date > b.occurrence_date ? 1 : 0
    );
}

/**
 * Turn a selection into a predicate over positions 1..count.
 * Returns null when the selection cancels the import.
 *
 * before(k) keeps positions < k, after(k) keeps positions > k,
 * range(a, b) is inclusive on both ends.
 *
 * @throws ValidationError for positions outside 1..count or an inverted range
 */
export function toIndexPredicate(selection: Selection, count: number): IndexPredicate | null {
    switch (selection.mode) {
        case 'all':
            return () => true;
        case 'cancel':
            return null;
        case 'before':
            assertPosition(selection.position, count);
            return (position) => position < selection.position;
        case 'after':
            assertPosition(selection.position, count);
            return (position) => position > selection.position;
        case 'range':
            assertPosition(selection.from, count);
            assertPosition(selection.to, count);
            if (selection.from > selection.to) {
                throw new ValidationError(`Invalid range ${selection.from}-${selection.to}: start is after end`);
            }
            return (position) => position >= selection.from && position <= selection.to;
        case 'list': {
            for (const position of selection.positions) {
                assertPosition(position, count);
            }
            const wanted = new Set(selection.positions);
            return (position) => wanted.has(position);
        }
    }
}

/**
 * Apply a selection to candidates presented in chronological order.
 * The selected items come back in that same order.
 */
export function applySelection<T extends { occurrence_date: string }>(
    items: readonly T[],
    selection: Selection
): SelectionResult<T> {
    const predicate = toIndexPredicate(selection, items.length);
    if (!predicate) {
        return { selected: [], deselected: items.length, cancelled: true };
    }

    const selected = sortChronologically(items).filter((_, i) => predicate(i + 1));
    return { selected, deselected: items.length - selected.length, cancelled: false };
}

/**
 * Parse an explicit position list: "2,3", "1-3, 5", "4 6".
 * Duplicates are dropped; result is ascending.
 *
 * @throws ValidationError on malformed input or out-of-range positions
 */
export function parsePositions(text: string, count: number): number[] {
    const tokens = text.split(/[\s,]+/).filter(t => t.length > 0);
    if (tokens.length === 0) {
        throw new ValidationError('No positions given');
    }

    const positions = new Set<number>();
    for (const token of tokens) {
        const range = token.match(/^(\d+)-(\d+)$/);
        if (range) {
            const from = parseInt(range[1], 10);
            const to = parseInt(range[2], 10);
            assertPosition(from, count);
            assertPosition(to, count);
            if (from > to) {
                throw new ValidationError(`Invalid range ${token}: start is after end`);
            }
            for (let p = from; p <= to; p++) positions.add(p);
        } else if (/^\d+$/.test(token)) {
            const position = parseInt(token, 10);
            assertPosition(position, count);
            positions.add(position);
        } else {
            throw new ValidationError(`Invalid position "${token}"`);
        }
    }

    return [...positions].sort((a, b) => a - b);
}

function assertPosition(position: number, count: number): void {
    if (!Number.isInteger(position) || position < 1 || position > count) {
        throw new ValidationError(`Position ${position} is out of range 1-${count}`);
    }
}
