import type { AverageMap } from '../aggregate/averageTemperatures.js';
import type { TemperatureBlock } from '../log/types.js';
import type { TemplateMapping } from '../template/types.js';
import { OutputGrid } from './OutputGrid.js';
import type { MergeSpan } from './OutputGrid.js';

export const AVERAGE_SECTION_TITLE = 'Average Temperature Map';

export type SectionKind = 'average' | 'block';

export interface SectionWritten {
  kind: SectionKind;
  /** 0 for the average section, 1..N for blocks */
  index: number;
  title: string;
  titleRow: number;
  cellsWritten: number;
}

export interface ComposeOptions {
  onSection?: (section: SectionWritten) => void;
}

export function blockSectionTitle(index: number, block: TemperatureBlock): string {
  return `Block ${index} (#####${block.title}#####)`;
}

function titleSpan(maxColumn: number): MergeSpan | null {
  return maxColumn > 1 ? { startColumn: 1, endColumn: maxColumn } : null;
}

/**
 * Lay out the average section and then every block, top to bottom.
 *
 * Each section is a title row followed by `maxRow` template rows and one
 * blank separator row, so consecutive title rows are `maxRow + 2` apart.
 */
export function composeGrid(
  mapping: TemplateMapping,
  averages: AverageMap,
  blocks: readonly TemperatureBlock[],
  options: ComposeOptions = {},
): OutputGrid {
  const grid = new OutputGrid();
  const span = titleSpan(mapping.maxColumn);
  let cursor = 1;

  const writeSection = (
    kind: SectionKind,
    index: number,
    title: string,
    readings: ReadonlyMap<number, number>,
  ): void => {
    const titleRow = cursor;
    grid.addTitle(titleRow, title, span);
    cursor += 1;

    let cellsWritten = 0;
    for (const { row, column, channel } of mapping.positions) {
      const value = readings.get(channel);
      if (value === undefined) continue;
      grid.setValue(cursor + row - 1, column, value);
      cellsWritten += 1;
    }
    cursor += mapping.maxRow + 1;

    options.onSection?.({ kind, index, title, titleRow, cellsWritten });
  };

  writeSection('average', 0, AVERAGE_SECTION_TITLE, averages);
  blocks.forEach((block, i) => {
    writeSection('block', i + 1, blockSectionTitle(i + 1, block), block.readings);
  });

  return grid;
}
