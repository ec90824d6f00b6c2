import { describe, it, expect } from 'vitest';
import { formatStatusReport, toEnvLines, toWire } from '../src/output.js';
import { buildDegraded, buildSuccess } from '../src/payload.js';
import { project } from '../src/projector.js';
import type { ProjectedResult, StoredRecord } from '../src/types.js';

const T0 = new Date('2026-10-18T12:00:00.000Z');

const result: ProjectedResult = {
  pct: '68',
  weeklyPct: '31',
  resetsIn: '1h12m',
  weeklyResetsIn: '4d2h',
  stale: 'false',
  valid: 'true',
};

describe('toWire', () => {
  it('should use the snake_case result keys', () => {
    expect(toWire(result)).toEqual({
      pct: '68',
      weekly_pct: '31',
      resets_in: '1h12m',
      weekly_resets_in: '4d2h',
      stale: 'false',
      valid: 'true',
    });
  });
});

describe('toEnvLines', () => {
  it('should print shell assignments', () => {
    expect(toEnvLines(result)).toEqual([
      "QUOTA_PCT='68'",
      "QUOTA_WEEKLY_PCT='31'",
      "QUOTA_RESETS_IN='1h12m'",
      "QUOTA_WEEKLY_RESETS_IN='4d2h'",
      "QUOTA_STALE='false'",
      "QUOTA_VALID='true'",
    ]);
  });

  it('should quote single quotes', () => {
    expect(toEnvLines({ ...result, resetsIn: "it's" }, 'Q_')[2]).toBe("Q_RESETS_IN='it'\\''s'");
  });
});

describe('formatStatusReport', () => {
  it('should say when nothing is cached', () => {
    expect(formatStatusReport(null, project(null, T0), T0)).toEqual(['No quota data cached yet.']);
  });

  it('should summarise a fresh record', () => {
    const record: StoredRecord = JSON.parse(JSON.stringify(buildSuccess(
      {
        five_hour: { utilization: 68, resets_at: '2026-10-18T13:12:00.000Z' },
        seven_day: { utilization: 31, resets_at: '2026-10-22T14:00:00.000Z' },
      },
      T0
    )));
    const later = new Date(T0.getTime() + 12 * 60_000);

    expect(formatStatusReport(record, project(record, later), later)).toEqual([
      '5h usage:        68% (resets in 1h12m)',
      'Weekly usage:    31% (resets in 4d2h)',
      'Valid:           true',
      'Stale:           false',
      'Last success:    2026-10-18T12:00:00.000Z (12m ago)',
    ]);
  });

  it('should include failure diagnostics for a stale record', () => {
    const record: StoredRecord = JSON.parse(JSON.stringify(
      buildDegraded({ quota_used_pct: 55 }, T0, 'Rate limited by API (HTTP 429).', 429)
    ));

    expect(formatStatusReport(record, project(record, T0), T0)).toEqual([
      '5h usage:        55%',
      'Weekly usage:    n/a',
      'Valid:           false',
      'Stale:           true',
      'Last success:    never',
      'Stale since:     2026-10-18T12:00:00.000Z',
      'Failures:        1 in a row',
      'Last error:      Rate limited by API (HTTP 429). [HTTP 429]',
    ]);
  });
});
