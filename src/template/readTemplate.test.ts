import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import * as XLSX from 'xlsx';
import { ThermalMapError } from '../errors.js';
import { buildTemplateMapping } from './TemplateMapper.js';
import { parseTemplateBuffer, readTemplateGrid, sheetToGrid } from './readTemplate.js';

function workbookBuffer(sheets: Array<{ name: string; sheet: XLSX.WorkSheet }>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const { name, sheet } of sheets) {
    XLSX.utils.book_append_sheet(workbook, sheet, name);
  }
  const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('expected a Buffer from XLSX.write');
  return out;
}

describe('sheetToGrid', () => {
  it('places cells at their absolute address', () => {
    const sheet = XLSX.utils.sheet_add_aoa({}, [[10, 11], [12]], { origin: 'B3' });
    const grid = sheetToGrid(sheet);
    const mapping = buildTemplateMapping(grid);
    expect(mapping.positions).toEqual([
      { row: 3, column: 2, channel: 10 },
      { row: 3, column: 3, channel: 11 },
      { row: 4, column: 2, channel: 12 },
    ]);
  });
});

describe('readTemplateGrid', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `thermal-map-template-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads only the first sheet', async () => {
    const path = join(dir, 'template.xlsx');
    await writeFile(path, workbookBuffer([
      { name: 'sheet1', sheet: XLSX.utils.aoa_to_sheet([[1, 2], [3, 'x']]) },
      { name: 'other', sheet: XLSX.utils.aoa_to_sheet([[99, 98, 97]]) },
    ]));

    const grid = await readTemplateGrid(path);
    expect(grid).toEqual([[1, 2], [3, 'x']]);
  });

  it('fails with MISSING_TEMPLATE when the file is absent', async () => {
    const path = join(dir, 'nope.xlsx');
    await expect(readTemplateGrid(path)).rejects.toBeInstanceOf(ThermalMapError);
    await expect(readTemplateGrid(path)).rejects.toMatchObject({ code: 'MISSING_TEMPLATE', path });
  });

  it('skips date cells instead of reading their serial number as a channel', () => {
    const sheet = XLSX.utils.aoa_to_sheet(
      [[1, 2], [], [], [], [null, null, null, new Date(Date.UTC(2024, 0, 1))]],
      { cellDates: true },
    );
    const mapping = buildTemplateMapping(parseTemplateBuffer(workbookBuffer([{ name: 'sheet1', sheet }])));

    expect(mapping.positions.map((p) => p.channel)).toEqual([1, 2]);
    expect(mapping.maxRow).toBe(1);
    expect(mapping.maxColumn).toBe(2);
  });

  it('parses a buffer without touching the filesystem', () => {
    const buffer = workbookBuffer([{ name: 'layout', sheet: XLSX.utils.aoa_to_sheet([[null, 8]]) }]);
    expect(buildTemplateMapping(parseTemplateBuffer(buffer)).positions).toEqual([
      { row: 1, column: 2, channel: 8 },
    ]);
  });
});
