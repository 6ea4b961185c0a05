import { describe, expect, it } from 'vitest';
import { OutputGrid } from './OutputGrid.js';

describe('OutputGrid', () => {
  it('distinguishes a written zero from an absent cell', () => {
    const grid = new OutputGrid();
    grid.setValue(2, 3, 0);
    expect(grid.hasValue(2, 3)).toBe(true);
    expect(grid.getValue(2, 3)).toBe(0);
    expect(grid.hasValue(2, 2)).toBe(false);
    expect(grid.getValue(2, 2)).toBeUndefined();
  });

  it('lists cells row-major regardless of write order', () => {
    const grid = new OutputGrid();
    grid.setValue(3, 1, 1);
    grid.setValue(1, 2, 2);
    grid.setValue(1, 1, 3);
    expect(grid.cellList().map((c) => [c.row, c.column])).toEqual([[1, 1], [1, 2], [3, 1]]);
    expect(grid.values).toEqual([1, 2, 3]);
  });

  it('includes merged title columns in the extent', () => {
    const grid = new OutputGrid();
    grid.addTitle(1, 'title', { startColumn: 1, endColumn: 4 });
    grid.setValue(2, 2, 1.5);
    expect(grid.extent()).toEqual({ maxRow: 2, maxColumn: 4 });
  });

  it('rejects non-positive addresses', () => {
    const grid = new OutputGrid();
    expect(() => grid.setValue(0, 1, 1)).toThrow(RangeError);
    expect(() => grid.setValue(1, 1.5, 1)).toThrow(/Invalid grid address/);
  });
});
