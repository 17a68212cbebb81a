/**
 * Delete Parser Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { extractDeleteKeyword, formatIndices, parseIndices } from './delete-parser';

describe('delete-parser', () => {
  describe('parseIndices', () => {
    test('parses a single index', () => {
      expect(parseIndices('2')).toEqual([2]);
    });

    test('accepts commas, spaces and both together', () => {
      expect(parseIndices('1,3')).toEqual([1, 3]);
      expect(parseIndices('1 3')).toEqual([1, 3]);
      expect(parseIndices(' 4 ,  2,1 ')).toEqual([4, 2, 1]);
    });

    test('keeps first-seen order and drops later duplicates', () => {
      expect(parseIndices('1,1,2')).toEqual([1, 2]);
      expect(parseIndices('3 1 3 2 1')).toEqual([3, 1, 2]);
    });

    test('rejects input with non-digit tokens', () => {
      expect(parseIndices('2 milk')).toBeNull();
      expect(parseIndices('rent')).toBeNull();
      expect(parseIndices('1.5')).toBeNull();
    });

    test('rejects zero and negative numbers', () => {
      expect(parseIndices('0')).toBeNull();
      expect(parseIndices('1,0')).toBeNull();
      expect(parseIndices('-1')).toBeNull();
      expect(parseIndices('2,-3')).toBeNull();
    });

    test('keeps numbers beyond the safe integer range as positions', () => {
      expect(parseIndices('99999999999999999999')).toEqual([100000000000000000000]);
    });

    test('rejects empty or blank input', () => {
      expect(parseIndices('')).toBeNull();
      expect(parseIndices('   ')).toBeNull();
      expect(parseIndices(',')).toBeNull();
    });
  });

  describe('extractDeleteKeyword', () => {
    test('returns the text after "delete"', () => {
      expect(extractDeleteKeyword('delete milk')).toBe('milk');
    });

    test('strips "reminder", "reminders" and "about"', () => {
      expect(extractDeleteKeyword('delete reminder milk')).toBe('milk');
      expect(extractDeleteKeyword('delete reminders about rent')).toBe('rent');
      expect(extractDeleteKeyword('delete reminder about the dentist')).toBe('the dentist');
    });

    test('is case-insensitive', () => {
      expect(extractDeleteKeyword('DELETE Reminder About Rent')).toBe('Rent');
    });

    test('passes index lists through', () => {
      expect(extractDeleteKeyword('delete 1, 3')).toBe('1, 3');
    });

    test('returns empty string when no target is named', () => {
      expect(extractDeleteKeyword('delete')).toBe('');
      expect(extractDeleteKeyword('delete reminder')).toBe('');
      expect(extractDeleteKeyword('delete reminders about  ')).toBe('');
    });

    test('returns empty string for messages that are not delete requests', () => {
      expect(extractDeleteKeyword('buy milk')).toBe('');
      expect(extractDeleteKeyword('deleted files need a backup')).toBe('');
      expect(extractDeleteKeyword('please delete milk')).toBe('');
    });
  });

  describe('formatIndices', () => {
    test('joins with comma and space', () => {
      expect(formatIndices([1, 2, 5])).toBe('1, 2, 5');
    });
  });
});
