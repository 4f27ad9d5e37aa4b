import { describe, it, expect } from 'vitest';
import { ValidationError } from '@split-sync/shared';
import { promptContinue, selectionFromAnswers } from '../src/utils/prompt.js';

describe('selectionFromAnswers', () => {
    it('should map the fixed menu choices', () => {
        expect(selectionFromAnswers('1', '', 5)).toEqual({ mode: 'all' });
        expect(selectionFromAnswers('6', '', 5)).toEqual({ mode: 'cancel' });
    });

    it('should read a single position for before and after', () => {
        expect(selectionFromAnswers('2', '3', 5)).toEqual({ mode: 'before', position: 3 });
        expect(selectionFromAnswers('3', ' 4 ', 5)).toEqual({ mode: 'after', position: 4 });
    });

    it('should read a range', () => {
        expect(selectionFromAnswers('4', '2-4', 5)).toEqual({ mode: 'range', from: 2, to: 4 });
        expect(selectionFromAnswers('4', '3', 5)).toEqual({ mode: 'range', from: 3, to: 3 });
    });

    it('should read an explicit list', () => {
        expect(selectionFromAnswers('5', '2,3', 5)).toEqual({ mode: 'list', positions: [2, 3] });
        expect(selectionFromAnswers('5', '5 1-2', 5)).toEqual({ mode: 'list', positions: [1, 2, 5] });
    });

    it('should reject positions the list does not have', () => {
        expect(() => selectionFromAnswers('2', '9', 5)).toThrow('Position 9 is out of range 1-5');
        expect(() => selectionFromAnswers('5', 'two', 5)).toThrow('Invalid position "two"');
        expect(() => selectionFromAnswers('3', '', 5)).toThrow(ValidationError);
    });

    it('should reject more than one position for before and after', () => {
        expect(() => selectionFromAnswers('2', '5,2', 5)).toThrow('Enter a single position, got "5,2"');
        expect(() => selectionFromAnswers('3', '1 4', 5)).toThrow('Enter a single position, got "1 4"');
    });

    it('should reject a range with more than two ends', () => {
        expect(() => selectionFromAnswers('4', '2-3-4', 5)).toThrow('Invalid range "2-3-4"');
        expect(() => selectionFromAnswers('4', '2,3-4', 5)).toThrow('Enter a single position, got "2,3"');
    });

    it('should reject an inverted range', () => {
        expect(() => selectionFromAnswers('4', '4-2', 5)).toThrow('Invalid range 4-2: start is after end');
    });

    it('should reject an unknown menu choice', () => {
        expect(() => selectionFromAnswers('7', '', 5)).toThrow('Unknown menu choice: 7');
    });
});

describe('promptContinue', () => {
    it('should not ask when --yes is given', async () => {
        await expect(promptContinue('Import?', true)).resolves.toBe(true);
    });
});
