/**
 * CLI output formatting
 */

import type { ProjectedResult, StoredRecord } from './types.js';
import { firstString, getPath } from './utils/fields.js';
import { timeSince } from './utils/time.js';

/**
 * Result keyed by its wire names (pct, weekly_pct, resets_in, ...)
 */
export function toWire(result: ProjectedResult): Record<string, string> {
  return {
    pct: result.pct,
    weekly_pct: result.weeklyPct,
    resets_in: result.resetsIn,
    weekly_resets_in: result.weeklyResetsIn,
    stale: result.stale,
    valid: result.valid,
  };
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * `eval`-able assignments: QUOTA_PCT='68', QUOTA_WEEKLY_PCT='31', ...
 */
export function toEnvLines(result: ProjectedResult, prefix = 'QUOTA_'): string[] {
  return Object.entries(toWire(result)).map(
    ([key, value]) => `${prefix}${key.toUpperCase()}=${shellQuote(value)}`
  );
}

function pctLabel(value: unknown): string {
  return typeof value === 'number' ? `${value}%` : 'n/a';
}

/**
 * Human summary of the full cache record for the `status` command
 */
export function formatStatusReport(record: StoredRecord | null, result: ProjectedResult, now: Date): string[] {
  if (!record) {
    return ['No quota data cached yet.'];
  }

  const lastSuccess = firstString(record, 'last_success_updated');
  const ago = timeSince(lastSuccess, now);
  const lines = [
    `5h usage:        ${pctLabel(getPath(record, 'current_session.percent_used') ?? getPath(record, 'quota_used_pct'))}` +
      (result.resetsIn ? ` (resets in ${result.resetsIn})` : ''),
    `Weekly usage:    ${pctLabel(getPath(record, 'weekly_limits.percent_used') ?? getPath(record, 'weekly_used_pct'))}` +
      (result.weeklyResetsIn ? ` (resets in ${result.weeklyResetsIn})` : ''),
    `Valid:           ${result.valid}`,
    `Stale:           ${result.stale}`,
    `Last success:    ${lastSuccess ? `${lastSuccess}${ago ? ` (${ago})` : ''}` : 'never'}`,
  ];

  if (result.stale === 'true') {
    const status = getPath(record, 'api_status_code');
    lines.push(`Stale since:     ${firstString(record, 'stale_since') || 'unknown'}`);
    lines.push(`Failures:        ${firstString(record, 'consecutive_failures') || '0'} in a row`);
    lines.push(`Last error:      ${firstString(record, 'error', 'stale_reason') || 'unknown'}` +
      (typeof status === 'number' ? ` [HTTP ${status}]` : ''));
  }

  return lines;
}
