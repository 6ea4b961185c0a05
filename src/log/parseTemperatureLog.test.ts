import { describe, expect, it } from 'vitest';
import { classifyLine, parseTemperatureLog } from './parseTemperatureLog.js';

describe('classifyLine', () => {
  it('recognizes delimiter lines', () => {
    expect(classifyLine('#####12#####')).toEqual({ kind: 'delimiter', token: '12' });
    expect(classifyLine('  #####007#####  ')).toEqual({ kind: 'delimiter', token: '007' });
  });

  it('rejects near-miss delimiters', () => {
    expect(classifyLine('####12#####').kind).toBe('other');
    expect(classifyLine('#####12##### trailing').kind).toBe('other');
    expect(classifyLine('##########').kind).toBe('other');
  });

  it('parses reading lines with flexible whitespace', () => {
    expect(classifyLine('chnl 3, valid 1, temp 25.5')).toEqual({
      kind: 'reading',
      channel: 3,
      valid: 1,
      temperature: 25.5,
    });
    expect(classifyLine('chnl   4 ,valid 0,   temp -3')).toEqual({
      kind: 'reading',
      channel: 4,
      valid: 0,
      temperature: -3,
    });
  });

  it('treats blank and malformed lines as non-data', () => {
    expect(classifyLine('   ').kind).toBe('blank');
    expect(classifyLine('chnl x, valid 1, temp 2').kind).toBe('other');
    expect(classifyLine('chnl 1, valid 1').kind).toBe('other');
    expect(classifyLine('# comment').kind).toBe('other');
  });
});

describe('parseTemperatureLog', () => {
  it('groups valid readings by delimiter in log order', () => {
    const { blocks } = parseTemperatureLog([
      '#####1#####',
      'chnl 1, valid 1, temp 20.0',
      'chnl 2, valid 1, temp 22.0',
      '#####2#####',
      'chnl 1, valid 1, temp 24.0',
      '',
    ].join('\n'));

    expect(blocks.map((b) => b.title)).toEqual(['1', '2']);
    expect([...(blocks[0]?.readings ?? new Map())]).toEqual([[1, 20], [2, 22]]);
    expect([...(blocks[1]?.readings ?? new Map())]).toEqual([[1, 24]]);
  });

  it('drops readings whose validity is not exactly 1', () => {
    const { blocks, diagnostics } = parseTemperatureLog([
      '#####5#####',
      'chnl 1, valid 0, temp 99.0',
      'chnl 2, valid 2, temp 98.0',
      'chnl 3, valid 1, temp 21.5',
    ].join('\n'));

    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.readings.has(1)).toBe(false);
    expect(blocks[0]?.readings.get(3)).toBe(21.5);
    expect(diagnostics.invalidReadings).toBe(2);
    expect(diagnostics.acceptedReadings).toBe(1);
  });

  it('keeps the last reading for a repeated channel', () => {
    const { blocks } = parseTemperatureLog([
      '#####1#####',
      'chnl 7, valid 1, temp 10',
      'chnl 7, valid 1, temp 11',
    ].join('\n'));

    expect(blocks[0]?.readings.get(7)).toBe(11);
    expect(blocks[0]?.readings.size).toBe(1);
  });

  it('emits nothing for back-to-back delimiters', () => {
    const { blocks, diagnostics } = parseTemperatureLog([
      '#####1#####',
      '#####2#####',
      'chnl 1, valid 1, temp 30',
      '#####3#####',
      'chnl 1, valid 0, temp 31',
    ].join('\n'));

    expect(blocks.map((b) => b.title)).toEqual(['2']);
    expect(diagnostics.delimiterLines).toBe(3);
    expect(diagnostics.droppedEmptyBlocks).toBe(2);
  });

  it('collects readings before the first delimiter into an unknown block', () => {
    const { blocks } = parseTemperatureLog([
      'chnl 1, valid 1, temp 5',
      '#####9#####',
      'chnl 1, valid 1, temp 6',
    ].join('\n'));

    expect(blocks.map((b) => b.title)).toEqual(['unknown', '9']);
  });

  it('ignores unrecognized lines and handles CRLF input', () => {
    const { blocks, diagnostics } = parseTemperatureLog(
      'header line\r\n#####4#####\r\nnoise\r\nchnl 2, valid 1, temp 1.25\r\n',
    );

    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.readings.get(2)).toBe(1.25);
    expect(diagnostics).toEqual({
      totalLines: 4,
      delimiterLines: 1,
      acceptedReadings: 1,
      invalidReadings: 0,
      unrecognizedLines: 2,
      droppedEmptyBlocks: 0,
    });
  });

  it('returns no blocks for empty input', () => {
    const { blocks, diagnostics } = parseTemperatureLog('');
    expect(blocks).toEqual([]);
    expect(diagnostics.totalLines).toBe(0);
  });
});
