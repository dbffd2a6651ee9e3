import { describe, it, expect } from 'vitest';
import { parseSelection } from './selection.js';
import { SelectionError } from '../errors.js';

describe('parseSelection', () => {
  it('reads numbers and ranges as sorted 0-based indices', () => {
    expect(parseSelection('5-7, 1,3', 10)).toEqual([0, 2, 4, 5, 6]);
  });

  it('collapses repeats and overlapping ranges', () => {
    expect(parseSelection('2,2,1-3', 5)).toEqual([0, 1, 2]);
  });

  it('accepts reversed ranges', () => {
    expect(parseSelection('4-2', 5)).toEqual([1, 2, 3]);
  });

  it('selects everything with "all"', () => {
    expect(parseSelection(' ALL ', 3)).toEqual([0, 1, 2]);
  });

  it('rejects numbers outside the list', () => {
    expect(() => parseSelection('0', 3)).toThrow(SelectionError);
    expect(() => parseSelection('2-4', 3)).toThrow('"2-4" is out of range; choose between 1 and 3');
  });

  it('rejects unreadable tokens', () => {
    expect(() => parseSelection('1,x', 3)).toThrow('Cannot read "x"');
  });

  it('rejects an empty selection', () => {
    expect(() => parseSelection('  ', 3)).toThrow('Nothing selected');
    expect(() => parseSelection(',,', 3)).toThrow('Nothing selected');
  });
});
