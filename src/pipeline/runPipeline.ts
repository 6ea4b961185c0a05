import { existsSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ThermalMapError } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { renderWorkbook } from '../render/WorkbookRenderer.js';
import { readTemplateGrid } from '../template/readTemplate.js';
import { buildThermalReport } from './buildThermalReport.js';
import type { PipelineProgress, ProgressCallback, RunPipelineOptions } from './types.js';

export const DEFAULT_OUTPUT_FILE_NAME = 'result.xlsx';

export function describeProgress(progress: PipelineProgress): string {
  switch (progress.stage) {
    case 'parse-start':
      return '1. Parsing temperature log...';
    case 'parsed': {
      const d = progress.diagnostics;
      return `   Found ${progress.blockCount} test blocks (${d.acceptedReadings} valid readings, ` +
        `${d.invalidReadings} invalid, ${d.unrecognizedLines} unrecognized lines)`;
    }
    case 'mapping-read':
      if (progress.positionCount === 0) {
        return '2. Template has no channel cells; sections will only contain titles';
      }
      return `2. Template is ${progress.maxRow} rows x ${progress.maxColumn} columns ` +
        `with ${progress.positionCount} channel positions`;
    case 'aggregated':
      return `3. Averaged ${progress.channelCount} channels`;
    case 'section-written':
      return progress.kind === 'average'
        ? `4. Wrote average map at row ${progress.titleRow}`
        : `   Wrote ${progress.title} at row ${progress.titleRow}`;
    case 'color-scale':
      return progress.min === null
        ? '5. No values written; skipping color scale'
        : `5. Color scale range: ${progress.min} ~ ${progress.max}`;
    case 'saving':
      return `6. Saving workbook to ${progress.outputPath}`;
    case 'saved':
      return 'Done.';
  }
}

export function createProgressLogger(logger: Logger): ProgressCallback {
  return (progress) => logger.info(describeProgress(progress));
}

/**
 * Read the log and template, build the report and write `result.xlsx`.
 *
 * Both inputs are checked before any processing. The output file is
 * overwritten; a failed save is reported as is and must not be retried
 * automatically.
 *
 * @returns absolute path of the written workbook
 */
export async function runPipeline(options: RunPipelineOptions): Promise<string> {
  const onProgress = options.onProgress ?? createProgressLogger(createLogger('info'));
  const logPath = resolve(options.logPath);
  const templatePath = resolve(options.templatePath);
  const outputDir = resolve(options.outputDir);

  if (!existsSync(logPath)) {
    throw new ThermalMapError('MISSING_FILE', `Log file not found: ${logPath}`, logPath);
  }
  if (!existsSync(templatePath)) {
    throw new ThermalMapError('MISSING_TEMPLATE', `Template file not found: ${templatePath}`, templatePath);
  }

  const logText = await readFile(logPath, 'utf-8');
  const templateGrid = await readTemplateGrid(templatePath);
  const report = buildThermalReport(logText, templateGrid, onProgress);

  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, options.outputFileName ?? DEFAULT_OUTPUT_FILE_NAME);
  onProgress({ stage: 'saving', outputPath });
  await renderWorkbook(report.grid, report.colorScale, outputPath);
  onProgress({ stage: 'saved', outputPath });

  return outputPath;
}
