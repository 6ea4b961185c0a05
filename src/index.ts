/**
 * thermal-map — lays out per-channel temperature logs on a template grid
 * and renders them as a color-scaled spreadsheet.
 *
 * This is the main entry point for the library.
 */

// Log parsing
export { parseTemperatureLog, classifyLine } from './log/parseTemperatureLog.js';
export { UNKNOWN_BLOCK_TITLE } from './log/types.js';
export type { TemperatureBlock, LogDiagnostics, LogParseResult } from './log/types.js';

// Template mapping
export { buildTemplateMapping, isEmptyTemplate, parseChannelCell, positionsByChannel } from './template/TemplateMapper.js';
export { readTemplateGrid, parseTemplateBuffer, sheetToGrid } from './template/readTemplate.js';
export type { TemplateCell, TemplateGrid, TemplateMapping, TemplatePosition } from './template/types.js';

// Aggregation
export { averageTemperatures } from './aggregate/averageTemperatures.js';
export type { AverageMap } from './aggregate/averageTemperatures.js';

// Layout and color scale
export { OutputGrid } from './layout/OutputGrid.js';
export type { GridCell, GridExtent, MergeSpan, SectionTitle } from './layout/OutputGrid.js';
export { composeGrid, blockSectionTitle, AVERAGE_SECTION_TITLE } from './layout/GridComposer.js';
export type { ComposeOptions, SectionKind, SectionWritten } from './layout/GridComposer.js';
export { planColorScale, cellAddress, rangeRef, COLOR_SCALE_COLORS } from './layout/ColorScalePlanner.js';
export type { CellRange, ColorScaleSpec } from './layout/ColorScalePlanner.js';

// Rendering
export { renderWorkbook, writeGridToSheet, buildColorScaleFormatting, RESULT_SHEET_NAME } from './render/WorkbookRenderer.js';

// Pipeline
export { buildThermalReport } from './pipeline/buildThermalReport.js';
export { runPipeline, describeProgress, createProgressLogger, DEFAULT_OUTPUT_FILE_NAME } from './pipeline/runPipeline.js';
export type { PipelineProgress, ProgressCallback, RunPipelineOptions, ThermalReport } from './pipeline/types.js';

// Configuration, logging and errors
export { loadConfig, resolveConfigPaths, applyDefaults, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, LoadedConfig } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { AppConfig, PathsConfig, OutputConfig, LoggingConfig } from './config/types.js';
export { createLogger, isLogLevel } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';
export { ThermalMapError, isThermalMapError } from './errors.js';
export type { ThermalMapErrorCode } from './errors.js';
