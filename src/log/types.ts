/**
 * Types produced by the temperature log parser.
 */

export const UNKNOWN_BLOCK_TITLE = 'unknown';

/**
 * One test block: the valid readings between two delimiter lines.
 */
export interface TemperatureBlock {
  /** Digit token of the opening `#####N#####` line, or `unknown` */
  title: string;
  /** channel -> temperature; a repeated channel keeps its last reading */
  readings: ReadonlyMap<number, number>;
}

export interface LogDiagnostics {
  totalLines: number;
  delimiterLines: number;
  acceptedReadings: number;
  /** Reading lines whose validity field was not exactly 1 */
  invalidReadings: number;
  /** Non-blank lines matching neither the delimiter nor the reading grammar */
  unrecognizedLines: number;
  /** Delimited sections that ended without a single valid reading */
  droppedEmptyBlocks: number;
}

export interface LogParseResult {
  blocks: TemperatureBlock[];
  diagnostics: LogDiagnostics;
}
