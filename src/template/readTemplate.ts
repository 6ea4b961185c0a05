import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import * as XLSX from 'xlsx';
import { ThermalMapError } from '../errors.js';
import type { TemplateCell, TemplateGrid } from './types.js';

// Dates are never channels, even though the file stores them as serial numbers
const normalizeCell = (cell: XLSX.CellObject | undefined): TemplateCell => {
  if (!cell || cell.t === 'z' || cell.t === 'e' || cell.t === 'd') return null;
  const value = cell.v;
  if (value === undefined || value === null || value instanceof Date) return null;
  return value;
};

/**
 * Lay out every stored cell of a sheet at its absolute address.
 */
export const sheetToGrid = (sheet: XLSX.WorkSheet): TemplateGrid => {
  const grid: TemplateGrid = [];
  for (const address of Object.keys(sheet)) {
    if (address.startsWith('!')) continue;
    const cell: XLSX.CellObject | undefined = sheet[address];
    const value = normalizeCell(cell);
    if (value === null) continue;
    const { r, c } = XLSX.utils.decode_cell(address);
    const row = grid[r] ?? [];
    row[c] = value;
    grid[r] = row;
  }
  return grid;
};

export const parseTemplateBuffer = (buffer: Buffer, source = '<buffer>'): TemplateGrid => {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const firstName = workbook.SheetNames[0];
  const sheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
  if (!sheet) {
    throw new ThermalMapError('INVALID_TEMPLATE', `Template workbook has no sheets: ${source}`, source);
  }
  return sheetToGrid(sheet);
};

/**
 * Read the first sheet of a template workbook as a cell grid.
 */
export async function readTemplateGrid(path: string): Promise<TemplateGrid> {
  if (!existsSync(path)) {
    throw new ThermalMapError('MISSING_TEMPLATE', `Template file not found: ${path}`, path);
  }
  const buffer = await readFile(path);
  return parseTemplateBuffer(buffer, path);
}
