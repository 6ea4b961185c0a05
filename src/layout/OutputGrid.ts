/**
 * Sparse, 1-based output grid with section titles.
 *
 * An unwritten cell has no value at all; it is distinct from a written 0.
 */

export interface MergeSpan {
  startColumn: number;
  endColumn: number;
}

export interface SectionTitle {
  row: number;
  text: string;
  /** Columns the title cell is merged across; null when the title fits one column */
  mergeSpan: MergeSpan | null;
}

export interface GridCell {
  row: number;
  column: number;
  value: number;
}

export interface GridExtent {
  maxRow: number;
  maxColumn: number;
}

const key = (row: number, column: number): string => `${row}:${column}`;

function assertAddress(row: number, column: number): void {
  if (!Number.isInteger(row) || row < 1 || !Number.isInteger(column) || column < 1) {
    throw new RangeError(`Invalid grid address (${row}, ${column})`);
  }
}

export class OutputGrid {
  private readonly cells = new Map<string, GridCell>();
  private readonly sectionTitles: SectionTitle[] = [];
  private readonly writtenValues: number[] = [];

  setValue(row: number, column: number, value: number): void {
    assertAddress(row, column);
    this.cells.set(key(row, column), { row, column, value });
    this.writtenValues.push(value);
  }

  addTitle(row: number, text: string, mergeSpan: MergeSpan | null): void {
    assertAddress(row, 1);
    this.sectionTitles.push({ row, text, mergeSpan });
  }

  getValue(row: number, column: number): number | undefined {
    return this.cells.get(key(row, column))?.value;
  }

  hasValue(row: number, column: number): boolean {
    return this.cells.has(key(row, column));
  }

  get titles(): readonly SectionTitle[] {
    return this.sectionTitles;
  }

  /** Every value written, in write order */
  get values(): readonly number[] {
    return this.writtenValues;
  }

  get cellCount(): number {
    return this.cells.size;
  }

  /** Cells sorted by row, then column */
  cellList(): GridCell[] {
    return [...this.cells.values()].sort((a, b) => a.row - b.row || a.column - b.column);
  }

  /**
   * Bottom-right corner of everything written, titles and merges included.
   */
  extent(): GridExtent {
    let maxRow = 0;
    let maxColumn = 0;
    for (const title of this.sectionTitles) {
      maxRow = Math.max(maxRow, title.row);
      maxColumn = Math.max(maxColumn, title.mergeSpan?.endColumn ?? 1);
    }
    for (const cell of this.cells.values()) {
      maxRow = Math.max(maxRow, cell.row);
      maxColumn = Math.max(maxColumn, cell.column);
    }
    return { maxRow, maxColumn };
  }

  toJSON(): { titles: SectionTitle[]; cells: GridCell[] } {
    return { titles: [...this.sectionTitles], cells: this.cellList() };
  }
}
