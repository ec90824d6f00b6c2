/**
 * Result projection
 *
 * Flattens whatever record is in the cache into the six strings the status
 * line reads. Nothing known yet → empty strings and "false" flags.
 */

import { windowFromRecord } from './payload.js';
import type { ProjectedResult, StoredRecord } from './types.js';
import { firstSet, firstString, flagSet } from './utils/fields.js';
import { normalizePercent } from './utils/normalize.js';

export const EMPTY_RESULT: Readonly<ProjectedResult> = Object.freeze({
  pct: '',
  weeklyPct: '',
  resetsIn: '',
  weeklyResetsIn: '',
  stale: 'false',
  valid: 'false',
});

function percentString(value: unknown): string {
  const pct = normalizePercent(value);
  return pct === null ? '' : String(pct);
}

function flagString(record: StoredRecord, path: string): 'true' | 'false' {
  return flagSet(record, path) ? 'true' : 'false';
}

export function project(record: StoredRecord | null, now: Date = new Date()): ProjectedResult {
  if (!record) return { ...EMPTY_RESULT };

  const stale = flagString(record, 'stale');
  let resetsIn = firstString(record, 'current_session.resets_in', 'resets_in');
  let weeklyResetsIn = firstString(record, 'weekly_limits.resets_in', 'weekly_resets');

  // A stale record's countdowns were frozen at write time; count from now instead.
  if (stale === 'true') {
    resetsIn = windowFromRecord(record, 'current', now).resets_in;
    weeklyResetsIn = windowFromRecord(record, 'weekly', now).resets_in;
  }

  return {
    pct: percentString(firstSet(record, 'current_session.percent_used', 'quota_used_pct')),
    weeklyPct: percentString(firstSet(record, 'weekly_limits.percent_used', 'weekly_used_pct')),
    resetsIn,
    weeklyResetsIn,
    stale,
    valid: flagString(record, 'valid'),
  };
}
