import type { GridExtent } from './OutputGrid.js';

/** RGB hex anchors of the 3-point scale */
export const COLOR_SCALE_COLORS = {
  low: '00FF00',
  mid: 'FFFF00',
  high: 'FF0000',
} as const;

export interface CellRange {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

export interface ColorScaleSpec {
  min: number;
  mid: number;
  max: number;
  colors: typeof COLOR_SCALE_COLORS;
  range: CellRange;
}

/**
 * Plan a green-yellow-red scale over every written value.
 *
 * The midpoint is halfway between min and max, not the mean or median of the
 * values. Returns null when nothing was written.
 */
export function planColorScale(values: readonly number[], extent: GridExtent): ColorScaleSpec | null {
  if (values.length === 0) return null;

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return {
    min,
    mid: (min + max) / 2,
    max,
    colors: COLOR_SCALE_COLORS,
    range: {
      top: 1,
      left: 1,
      bottom: Math.max(extent.maxRow, 1),
      right: Math.max(extent.maxColumn, 1),
    },
  };
}

function columnLetters(column: number): string {
  let n = column;
  let out = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

export function cellAddress(row: number, column: number): string {
  return `${columnLetters(column)}${row}`;
}

/** A1-style reference, e.g. `A1:C12` */
export function rangeRef(range: CellRange): string {
  return `${cellAddress(range.top, range.left)}:${cellAddress(range.bottom, range.right)}`;
}
