/**
 * Template grid and channel mapping types.
 */

export type TemplateCell = string | number | boolean | null;

/** Row-major cells of the template's first sheet; index [0][0] is row 1, column 1 */
export type TemplateGrid = TemplateCell[][];

export interface TemplatePosition {
  /** 1-based */
  row: number;
  /** 1-based */
  column: number;
  channel: number;
}

export interface TemplateMapping {
  /** Mapped cells in row-major order, one entry per position */
  positions: TemplatePosition[];
  maxRow: number;
  maxColumn: number;
}
