import { SelectionError } from '../errors.js';

/**
 * Parses a 1-based selection such as "1,3,5-7" or "all" into sorted,
 * de-duplicated 0-based indices.
 */
export function parseSelection(input: string, count: number): number[] {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) {
    throw new SelectionError('Nothing selected');
  }
  if (trimmed === 'all' || trimmed === '*') {
    return Array.from({ length: count }, (_, index) => index);
  }

  const indices = new Set<number>();
  for (const token of trimmed.split(',').map((part) => part.trim()).filter(Boolean)) {
    const range = token.match(/^(\d+)\s*-\s*(\d+)$/);
    const single = token.match(/^(\d+)$/);

    let start: number;
    let end: number;
    if (range) {
      start = Number(range[1]);
      end = Number(range[2]);
    } else if (single) {
      start = end = Number(single[1]);
    } else {
      throw new SelectionError(`Cannot read "${token}"; use numbers like 1,3,5-7`);
    }

    if (start > end) [start, end] = [end, start];
    if (start < 1 || end > count) {
      throw new SelectionError(`"${token}" is out of range; choose between 1 and ${count}`);
    }
    for (let n = start; n <= end; n++) indices.add(n - 1);
  }

  if (indices.size === 0) {
    throw new SelectionError('Nothing selected');
  }
  return [...indices].sort((a, b) => a - b);
}
