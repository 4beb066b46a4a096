import { describe, it, expect } from 'vitest';
import { filterCandidates, fuzzyMatch } from './blessedPicker.js';
import { paint } from '../utils/ansi.js';

describe('fuzzyMatch', () => {
  it('should match subsequences ignoring case', () => {
    expect(fuzzyMatch('abrd', 'Abbey Road')).toBe(true);
    expect(fuzzyMatch('ROAD', 'Abbey Road')).toBe(true);
  });

  it('should require characters in order', () => {
    expect(fuzzyMatch('dra', 'Abbey Road')).toBe(false);
  });

  it('should ignore spaces in the query', () => {
    expect(fuzzyMatch('let be', 'Let It Be')).toBe(true);
  });

  it('should match everything for an empty query', () => {
    expect(fuzzyMatch('', 'anything')).toBe(true);
  });
});

describe('filterCandidates', () => {
  it('should match on text without colour codes and keep order', () => {
    const candidates = [
      { label: paint('Abbey Road', 'green'), value: 1 },
      { label: paint('Revolver', 'green'), value: 2 },
      { label: paint('Rubber Soul', 'green'), value: 3 },
    ];
    // "32m" only appears inside the escape codes
    expect(filterCandidates(candidates, '32m')).toEqual([]);
    expect(filterCandidates(candidates, 'r')).toEqual([0, 1, 2]);
    expect(filterCandidates(candidates, 'rso')).toEqual([2]);
  });
});
