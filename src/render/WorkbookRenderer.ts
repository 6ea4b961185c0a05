/**
 * Serializes an output grid into an .xlsx workbook.
 */

import ExcelJS from 'exceljs';
import type { ConditionalFormattingOptions, Worksheet } from 'exceljs';
import type { OutputGrid } from '../layout/OutputGrid.js';
import { rangeRef } from '../layout/ColorScalePlanner.js';
import type { ColorScaleSpec } from '../layout/ColorScalePlanner.js';

export const RESULT_SHEET_NAME = 'result';

const TITLE_FONT = { bold: true, size: 12 } as const;
const TITLE_ALIGNMENT = { horizontal: 'center', vertical: 'middle' } as const;

const toArgb = (rgb: string): string => `FF${rgb.toUpperCase()}`;

export function buildColorScaleFormatting(spec: ColorScaleSpec): ConditionalFormattingOptions {
  return {
    ref: rangeRef(spec.range),
    rules: [
      {
        type: 'colorScale',
        priority: 1,
        cfvo: [
          { type: 'num', value: spec.min },
          { type: 'num', value: spec.mid },
          { type: 'num', value: spec.max },
        ],
        color: [
          { argb: toArgb(spec.colors.low) },
          { argb: toArgb(spec.colors.mid) },
          { argb: toArgb(spec.colors.high) },
        ],
      },
    ],
  };
}

export function writeGridToSheet(sheet: Worksheet, grid: OutputGrid, colorScale: ColorScaleSpec | null): void {
  for (const title of grid.titles) {
    const cell = sheet.getCell(title.row, 1);
    cell.value = title.text;
    cell.font = { ...TITLE_FONT };
    cell.alignment = { ...TITLE_ALIGNMENT };
    if (title.mergeSpan) {
      sheet.mergeCells(title.row, title.mergeSpan.startColumn, title.row, title.mergeSpan.endColumn);
    }
  }

  for (const { row, column, value } of grid.cellList()) {
    sheet.getCell(row, column).value = value;
  }

  if (colorScale) {
    sheet.addConditionalFormatting(buildColorScaleFormatting(colorScale));
  }
}

/**
 * Write the grid to `outputPath`, replacing any existing file.
 *
 * Write failures propagate to the caller unchanged.
 */
export async function renderWorkbook(
  grid: OutputGrid,
  colorScale: ColorScaleSpec | null,
  outputPath: string,
): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(RESULT_SHEET_NAME);
  writeGridToSheet(sheet, grid, colorScale);
  await workbook.xlsx.writeFile(outputPath);
  return outputPath;
}
