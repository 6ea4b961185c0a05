import type { AverageMap } from '../aggregate/averageTemperatures.js';
import type { OutputGrid } from '../layout/OutputGrid.js';
import type { ColorScaleSpec } from '../layout/ColorScalePlanner.js';
import type { SectionKind } from '../layout/GridComposer.js';
import type { LogDiagnostics, TemperatureBlock } from '../log/types.js';
import type { TemplateMapping } from '../template/types.js';

/**
 * Checkpoints reported synchronously while a pipeline runs, in this order.
 */
export type PipelineProgress =
  | { stage: 'parse-start' }
  | { stage: 'parsed'; blockCount: number; diagnostics: LogDiagnostics }
  | { stage: 'mapping-read'; maxRow: number; maxColumn: number; positionCount: number; channelCount: number }
  | { stage: 'aggregated'; channelCount: number }
  | { stage: 'section-written'; kind: SectionKind; index: number; title: string; titleRow: number; cellsWritten: number }
  | { stage: 'color-scale'; min: number; max: number }
  | { stage: 'color-scale'; min: null; max: null }
  | { stage: 'saving'; outputPath: string }
  | { stage: 'saved'; outputPath: string };

export type ProgressCallback = (progress: PipelineProgress) => void;

export interface ThermalReport {
  blocks: TemperatureBlock[];
  diagnostics: LogDiagnostics;
  mapping: TemplateMapping;
  averages: AverageMap;
  grid: OutputGrid;
  colorScale: ColorScaleSpec | null;
}

export interface RunPipelineOptions {
  logPath: string;
  templatePath: string;
  outputDir: string;
  /** Defaults to `result.xlsx` */
  outputFileName?: string;
  onProgress?: ProgressCallback;
}
