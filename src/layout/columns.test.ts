import { describe, it, expect } from 'vitest';
import { resolveColumnWidths } from './columns.js';

describe('resolveColumnWidths', () => {
  it('uses content widths within the column limits', () => {
    const widths = resolveColumnWidths(
      [
        { contentWidth: 5 },
        { contentWidth: 3, minWidth: 4 },
        { contentWidth: 10, maxWidth: 6 },
        { contentWidth: 9, width: 2 },
      ],
      100
    );
    expect(widths).toEqual([5, 4, 6, 2]);
  });

  it('leaves slack unused without expand', () => {
    expect(resolveColumnWidths([{ contentWidth: 2 }], 10)).toEqual([2]);
  });

  it('collapses proportionally when too wide', () => {
    expect(resolveColumnWidths([{ contentWidth: 10 }, { contentWidth: 10 }], 12)).toEqual([6, 6]);
  });

  it('keeps fixed columns at their width while collapsing', () => {
    expect(resolveColumnWidths([{ contentWidth: 3, width: 8 }, { contentWidth: 20 }], 15)).toEqual([8, 7]);
  });

  it('expands ratio columns into the slack', () => {
    const widths = resolveColumnWidths(
      [{ contentWidth: 2, ratio: 1 }, { contentWidth: 2 }, { contentWidth: 2, ratio: 3 }],
      14,
      { expand: true }
    );
    expect(widths).toEqual([4, 2, 8]);
  });

  it('expands in proportion to width when no column has a ratio', () => {
    expect(resolveColumnWidths([{ contentWidth: 2 }, { contentWidth: 6 }], 12, { expand: true })).toEqual([3, 9]);
  });

  it('returns nothing for no columns', () => {
    expect(resolveColumnWidths([], 40, { expand: true })).toEqual([]);
  });
});
