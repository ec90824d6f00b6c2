/**
 * Cache record builders
 *
 * Pure functions of their inputs and `now`. `buildSuccess` turns a fresh API
 * response into a valid record; `buildDegraded` carries the best known values
 * forward after a failed attempt and marks the result stale.
 */

import { config } from './config.js';
import {
  SCHEMA_VERSION,
  type ExtraUsage,
  type QuotaRecord,
  type StoredRecord,
  type UsageWindow,
} from './types.js';
import { firstSet, firstString, flagSet, getPath, scalarOrNull } from './utils/fields.js';
import { normalizePercent } from './utils/normalize.js';
import { formatUtc, timeUntil, toIsoUtc } from './utils/time.js';

// =============================================================================
// Field Sources
// =============================================================================

/**
 * Where each window lives in a stored record, newest schema first.
 */
const WINDOW_FIELDS = {
  current: {
    percent: ['current_session.percent_used', 'quota_used_pct'],
    resetsAt: ['current_session.resets_at'],
    resetsIn: ['current_session.resets_in', 'resets_in'],
  },
  weekly: {
    percent: ['weekly_limits.percent_used', 'weekly_used_pct'],
    resetsAt: ['weekly_limits.resets_at'],
    resetsIn: ['weekly_limits.resets_in', 'weekly_resets'],
  },
} as const;

type WindowName = keyof typeof WINDOW_FIELDS;

function emptyWindow(): UsageWindow {
  return { percent_used: null, resets_at: '', resets_in: '' };
}

function emptyExtraUsage(): ExtraUsage {
  return { is_enabled: null, utilization: null, used_credits: null, monthly_limit: null };
}

function extraUsageFrom(doc: unknown): ExtraUsage {
  return {
    is_enabled: scalarOrNull(doc, 'extra_usage.is_enabled'),
    utilization: normalizePercent(getPath(doc, 'extra_usage.utilization')),
    used_credits: scalarOrNull(doc, 'extra_usage.used_credits'),
    monthly_limit: scalarOrNull(doc, 'extra_usage.monthly_limit'),
  };
}

/**
 * Usage window from an upstream block ({ utilization, resets_at })
 */
function windowFromApi(body: unknown, key: string, now: Date): UsageWindow {
  const resetsAt = toIsoUtc(firstString(body, `${key}.resets_at`));
  return {
    percent_used: normalizePercent(getPath(body, `${key}.utilization`)),
    resets_at: resetsAt,
    resets_in: resetsAt ? timeUntil(resetsAt, now) : '',
  };
}

/**
 * Usage window carried over from a stored record. The countdown is
 * recomputed from `resets_at` because time has passed since it was written;
 * the stored string only survives when the timestamp is unusable.
 */
export function windowFromRecord(record: StoredRecord, name: WindowName, now: Date): UsageWindow {
  const fields = WINDOW_FIELDS[name];
  const resetsAt = firstString(record, ...fields.resetsAt);
  const recomputed = resetsAt ? timeUntil(resetsAt, now) : '';

  return {
    percent_used: normalizePercent(firstSet(record, ...fields.percent)),
    resets_at: resetsAt,
    resets_in: recomputed || firstString(record, ...fields.resetsIn),
  };
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Record for a successful fetch. `sourceUrl` is the endpoint the body came from.
 */
export function buildSuccess(body: unknown, now: Date, sourceUrl: string = config.api.url): QuotaRecord {
  const ts = formatUtc(now);
  const current = windowFromApi(body, 'five_hour', now);
  const weekly = windowFromApi(body, 'seven_day', now);

  return {
    schema_version: SCHEMA_VERSION,
    source_url: sourceUrl,
    attempted_at_utc: ts,
    fetched_at_utc: ts,
    current_session: current,
    weekly_limits: weekly,
    extra_usage: extraUsageFrom(body),
    quota_used_pct: current.percent_used,
    weekly_used_pct: weekly.percent_used,
    resets_in: current.resets_in,
    weekly_resets: weekly.resets_in,
    updated: ts,
    valid: true,
    stale: false,
    stale_since: null,
    stale_reason: '',
    last_success_updated: ts,
    error: '',
    api_status_code: 200,
    consecutive_failures: 0,
  };
}

/**
 * Last successful update known to a stored record. Older schemas had no
 * `last_success_updated`, so fall back to `updated` on a valid record and
 * then to `fetched_at_utc`.
 */
function lastSuccessOf(previous: StoredRecord): string {
  const recorded = firstString(previous, 'last_success_updated');
  if (recorded) return recorded;

  if (flagSet(previous, 'valid')) {
    const updated = firstString(previous, 'updated');
    if (updated) return updated;
  }
  return firstString(previous, 'fetched_at_utc');
}

function failuresOf(previous: StoredRecord): number {
  const value = getPath(previous, 'consecutive_failures');
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return 0;
}

/**
 * Record for a failed attempt, built on top of the previous record (or empty
 * defaults on a cold start). `staleSince` survives across consecutive
 * failures and restarts at `now` when the previous record was fresh.
 */
export function buildDegraded(
  previous: StoredRecord | null,
  now: Date,
  errorText: string,
  statusCode: number | null,
  sourceUrl: string = config.api.url
): QuotaRecord {
  const ts = formatUtc(now);

  let current = emptyWindow();
  let weekly = emptyWindow();
  let extra = emptyExtraUsage();
  let source = sourceUrl;
  let fetchedAt = '';
  let lastSuccess = '';
  let staleSince = ts;
  let failures = 0;

  if (previous) {
    current = windowFromRecord(previous, 'current', now);
    weekly = windowFromRecord(previous, 'weekly', now);
    extra = extraUsageFrom(previous);
    source = firstString(previous, 'source_url') || sourceUrl;
    fetchedAt = firstString(previous, 'fetched_at_utc');
    lastSuccess = lastSuccessOf(previous);
    failures = failuresOf(previous);

    if (flagSet(previous, 'stale')) {
      staleSince = firstString(previous, 'stale_since') || ts;
    }
  }

  return {
    schema_version: SCHEMA_VERSION,
    source_url: source,
    attempted_at_utc: ts,
    fetched_at_utc: fetchedAt,
    current_session: current,
    weekly_limits: weekly,
    extra_usage: extra,
    quota_used_pct: current.percent_used,
    weekly_used_pct: weekly.percent_used,
    resets_in: current.resets_in,
    weekly_resets: weekly.resets_in,
    updated: ts,
    valid: false,
    stale: true,
    stale_since: staleSince,
    stale_reason: errorText,
    last_success_updated: lastSuccess,
    error: errorText,
    api_status_code: statusCode,
    consecutive_failures: failures + 1,
  };
}
