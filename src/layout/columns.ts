/**
 * Table column widths from measured content and per-column constraints.
 */

import { distribute, shrinkSizes } from './ratio.js';

export interface ColumnSpec {
  /** Widest content of the column in cells (header, cells and footer). */
  contentWidth: number;
  /** Fixed width; wins over content and limits. */
  width?: number;
  minWidth?: number;
  maxWidth?: number;
  /** Share of the slack when expanding. */
  ratio?: number;
}

export interface ColumnWidthOptions {
  /** Grow the columns to fill the available width. */
  expand?: boolean;
}

function naturalWidth(column: ColumnSpec): number {
  if (column.width !== undefined) return column.width;
  const width = Math.max(column.contentWidth, column.minWidth ?? 1);
  return column.maxWidth === undefined ? width : Math.min(width, column.maxWidth);
}

function minimumWidth(column: ColumnSpec): number {
  const minimum = column.minWidth ?? 1;
  return column.width === undefined ? minimum : Math.max(column.width, minimum);
}

/**
 * Resolve the width of each column for the available width (excluding
 * borders and padding).
 */
export function resolveColumnWidths(
  columns: readonly ColumnSpec[],
  available: number,
  options: ColumnWidthOptions = {}
): number[] {
  let widths = columns.map(naturalWidth);
  let total = widths.reduce((sum, width) => sum + width, 0);

  if (total > available) {
    widths = shrinkSizes(widths, columns.map(minimumWidth), available);
    total = widths.reduce((sum, width) => sum + width, 0);
  }

  if (options.expand && total < available) {
    const slack = available - total;
    const ratios = columns.map((column) => column.ratio ?? 0);
    const weights = ratios.some((ratio) => ratio > 0) ? ratios : widths.map((width) => Math.max(1, width));
    const extra = distribute(slack, weights);
    widths = widths.map((width, index) => width + extra[index]);
  }

  return widths;
}
