/**
 * Configuration types for the thermal-map command line.
 *
 * These types define the structure of thermal-map.yaml. The pipeline itself
 * never reads configuration; it takes every path as an argument.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  paths: PathsConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/**
 * Default input and output locations.
 */
export interface PathsConfig {
  /** Temperature log (default: 'data/data1.txt') */
  log: string;
  /** Template workbook (default: 'template/template.xlsx') */
  template: string;
  /** Directory the result workbook is written to (default: 'result') */
  outputDir: string;
}

export interface OutputConfig {
  /** Result workbook name (default: 'result.xlsx') */
  fileName: string;
}

export interface LoggingConfig {
  /** Log level (default: 'info') */
  level: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  paths: {
    log: 'data/data1.txt',
    template: 'template/template.xlsx',
    outputDir: 'result',
  },
  output: {
    fileName: 'result.xlsx',
  },
  logging: {
    level: 'info',
  },
};
