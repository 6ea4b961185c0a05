import type { TemplateCell, TemplateGrid, TemplateMapping, TemplatePosition } from './types.js';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Read a template cell as a channel number.
 *
 * Numbers must be integral; text must be a plain (optionally signed) run of
 * digits. Anything else is not a channel.
 */
export function parseChannelCell(cell: TemplateCell | undefined): number | null {
  if (typeof cell === 'number') {
    return Number.isInteger(cell) ? cell : null;
  }
  if (typeof cell === 'string') {
    const text = cell.trim();
    if (!INTEGER_TEXT.test(text)) return null;
    const value = Number.parseInt(text, 10);
    return Number.isSafeInteger(value) ? value : null;
  }
  return null;
}

/**
 * Build the position -> channel mapping and the template extent.
 *
 * A channel listed at several positions is mapped at each of them. A template
 * with no integer cell yields an empty mapping with a 0 x 0 extent.
 */
export function buildTemplateMapping(grid: TemplateGrid): TemplateMapping {
  const positions: TemplatePosition[] = [];
  let maxRow = 0;
  let maxColumn = 0;

  grid.forEach((cells, rowIndex) => {
    cells.forEach((cell, columnIndex) => {
      const channel = parseChannelCell(cell);
      if (channel === null) return;
      const row = rowIndex + 1;
      const column = columnIndex + 1;
      positions.push({ row, column, channel });
      maxRow = Math.max(maxRow, row);
      maxColumn = Math.max(maxColumn, column);
    });
  });

  return { positions, maxRow, maxColumn };
}

export function isEmptyTemplate(mapping: TemplateMapping): boolean {
  return mapping.positions.length === 0;
}

/**
 * channel -> every position it occupies.
 */
export function positionsByChannel(mapping: TemplateMapping): Map<number, TemplatePosition[]> {
  const out = new Map<number, TemplatePosition[]>();
  for (const position of mapping.positions) {
    const list = out.get(position.channel);
    if (list) {
      list.push(position);
    } else {
      out.set(position.channel, [position]);
    }
  }
  return out;
}
