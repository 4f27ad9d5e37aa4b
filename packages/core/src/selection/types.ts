/**
 * A user's choice over candidates numbered 1..count in chronological order.
 */
export type Selection =
    | { mode: 'all' }
    | { mode: 'before'; position: number }
    | { mode: 'after'; position: number }
    | { mode: 'range'; from: number; to: number }
    | { mode: 'list'; positions: number[] }
    | { mode: 'cancel' };

/**
 * Keeps a 1-based position or not.
 */
export type IndexPredicate = (position: number) => boolean;

export interface SelectionResult<T> {
    selected: T[];
    deselected: number;
    cancelled: boolean;
}
