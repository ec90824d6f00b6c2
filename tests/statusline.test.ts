import { describe, it, expect } from 'vitest';
import { renderSegment, renderStatusLine } from '../src/statusline.js';
import type { ProjectedResult } from '../src/types.js';

const result: ProjectedResult = {
  pct: '68',
  weeklyPct: '31',
  resetsIn: '1h12m',
  weeklyResetsIn: '4d2h',
  stale: 'false',
  valid: 'true',
};

describe('renderSegment', () => {
  it('should render percentage and countdown', () => {
    expect(renderSegment('5h', '68', '1h12m', false, { color: false })).toBe('5h:68% ↻1h12m');
  });

  it('should flag stale data', () => {
    expect(renderSegment('5h', '68', '1h12m', true, { color: false })).toBe('5h:68%⚠ ↻1h12m');
  });

  it('should omit an unknown countdown', () => {
    expect(renderSegment('7d', '31', '', false, { color: false })).toBe('7d:31%');
  });

  it('should render nothing without a percentage', () => {
    expect(renderSegment('5h', '', '1h12m', false)).toBe('');
  });

  it('should colour by usage', () => {
    expect(renderSegment('5h', '80', '', false)).toBe('\x1b[31m5h:80%\x1b[0m');
    expect(renderSegment('5h', '60', '', false)).toBe('\x1b[33m5h:60%\x1b[0m');
    expect(renderSegment('5h', '50', '', false)).toBe('\x1b[32m5h:50%\x1b[0m');
  });

  it('should honour custom thresholds', () => {
    expect(renderSegment('5h', '30', '', false, { warnAt: 20, criticalAt: 90 })).toBe('\x1b[33m5h:30%\x1b[0m');
  });
});

describe('renderStatusLine', () => {
  it('should join both windows', () => {
    expect(renderStatusLine(result, { color: false })).toBe('5h:68% ↻1h12m 7d:31% ↻4d2h');
  });

  it('should mark both windows when stale', () => {
    expect(renderStatusLine({ ...result, stale: 'true' }, { color: false })).toBe('5h:68%⚠ ↻1h12m 7d:31%⚠ ↻4d2h');
  });

  it('should skip windows with no data', () => {
    expect(renderStatusLine({ ...result, weeklyPct: '' }, { color: false })).toBe('5h:68% ↻1h12m');
    expect(renderStatusLine({ ...result, pct: '', weeklyPct: '' })).toBe('');
  });
});
