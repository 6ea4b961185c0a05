import { UNKNOWN_BLOCK_TITLE } from './types.js';
import type { LogDiagnostics, LogParseResult, TemperatureBlock } from './types.js';

const DELIMITER_PATTERN = /^#####(\d+)#####$/;
const READING_PATTERN = /^chnl\s+(\d+)\s*,\s*valid\s+(\d+)\s*,\s*temp\s+([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)/;

type ParserState =
  | { kind: 'idle' }
  | { kind: 'open'; title: string; readings: Map<number, number> };

type LogLine =
  | { kind: 'delimiter'; token: string }
  | { kind: 'reading'; channel: number; valid: number; temperature: number }
  | { kind: 'blank' }
  | { kind: 'other' };

export function classifyLine(raw: string): LogLine {
  const line = raw.trim();
  if (line.length === 0) return { kind: 'blank' };

  const delimiter = DELIMITER_PATTERN.exec(line);
  if (delimiter?.[1] !== undefined) {
    return { kind: 'delimiter', token: delimiter[1] };
  }

  const reading = READING_PATTERN.exec(line);
  if (reading?.[1] !== undefined && reading[2] !== undefined && reading[3] !== undefined) {
    const temperature = Number.parseFloat(reading[3]);
    if (!Number.isFinite(temperature)) return { kind: 'other' };
    return {
      kind: 'reading',
      channel: Number.parseInt(reading[1], 10),
      valid: Number.parseInt(reading[2], 10),
      temperature,
    };
  }

  return { kind: 'other' };
}

/**
 * Split a temperature log into test blocks.
 *
 * Lines that match neither grammar are skipped. A block that collects no valid
 * reading is never emitted. Readings that appear before the first delimiter
 * open an implicit block titled `unknown`.
 */
export function parseTemperatureLog(content: string): LogParseResult {
  const blocks: TemperatureBlock[] = [];
  const diagnostics: LogDiagnostics = {
    totalLines: 0,
    delimiterLines: 0,
    acceptedReadings: 0,
    invalidReadings: 0,
    unrecognizedLines: 0,
    droppedEmptyBlocks: 0,
  };
  let state: ParserState = { kind: 'idle' };

  const close = (): void => {
    if (state.kind !== 'open') return;
    if (state.readings.size > 0) {
      blocks.push({ title: state.title, readings: state.readings });
    } else {
      diagnostics.droppedEmptyBlocks += 1;
    }
    state = { kind: 'idle' };
  };

  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  for (const raw of lines) {
    diagnostics.totalLines += 1;
    const line = classifyLine(raw);

    switch (line.kind) {
      case 'delimiter':
        diagnostics.delimiterLines += 1;
        close();
        state = { kind: 'open', title: line.token, readings: new Map() };
        break;
      case 'reading':
        if (line.valid !== 1) {
          diagnostics.invalidReadings += 1;
          break;
        }
        if (state.kind === 'idle') {
          state = { kind: 'open', title: UNKNOWN_BLOCK_TITLE, readings: new Map() };
        }
        state.readings.set(line.channel, line.temperature);
        diagnostics.acceptedReadings += 1;
        break;
      case 'other':
        diagnostics.unrecognizedLines += 1;
        break;
      case 'blank':
        break;
    }
  }
  close();

  return { blocks, diagnostics };
}
