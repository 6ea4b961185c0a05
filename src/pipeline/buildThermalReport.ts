import { averageTemperatures } from '../aggregate/averageTemperatures.js';
import { planColorScale } from '../layout/ColorScalePlanner.js';
import { composeGrid } from '../layout/GridComposer.js';
import { parseTemperatureLog } from '../log/parseTemperatureLog.js';
import { buildTemplateMapping, positionsByChannel } from '../template/TemplateMapper.js';
import type { TemplateGrid } from '../template/types.js';
import type { ProgressCallback, ThermalReport } from './types.js';

/**
 * Run the in-memory part of the pipeline: parse, map, average, lay out and
 * plan the color scale. Identical inputs always give identical grids.
 */
export function buildThermalReport(
  logText: string,
  templateGrid: TemplateGrid,
  onProgress?: ProgressCallback,
): ThermalReport {
  const emit: ProgressCallback = onProgress ?? (() => undefined);

  emit({ stage: 'parse-start' });
  const { blocks, diagnostics } = parseTemperatureLog(logText);
  emit({ stage: 'parsed', blockCount: blocks.length, diagnostics });

  const mapping = buildTemplateMapping(templateGrid);
  emit({
    stage: 'mapping-read',
    maxRow: mapping.maxRow,
    maxColumn: mapping.maxColumn,
    positionCount: mapping.positions.length,
    channelCount: positionsByChannel(mapping).size,
  });

  const averages = averageTemperatures(blocks);
  emit({ stage: 'aggregated', channelCount: averages.size });

  const grid = composeGrid(mapping, averages, blocks, {
    onSection: (section) => emit({ stage: 'section-written', ...section }),
  });

  const colorScale = planColorScale(grid.values, grid.extent());
  emit(
    colorScale
      ? { stage: 'color-scale', min: colorScale.min, max: colorScale.max }
      : { stage: 'color-scale', min: null, max: null },
  );

  return { blocks, diagnostics, mapping, averages, grid, colorScale };
}
