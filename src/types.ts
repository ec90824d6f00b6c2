/**
 * StatusQuota Type Definitions
 */

import type { JsonObject } from './utils/fields.js';

// =============================================================================
// Cache Record (schema version 2, snake_case on disk)
// =============================================================================

export const SCHEMA_VERSION = 2;

/**
 * One rolling usage window (5-hour session or 7-day limit)
 */
export interface UsageWindow {
  percent_used: number | null;
  resets_at: string;        // ISO-8601 UTC, "" when unknown
  resets_in: string;        // "1h12m", "" when unknown
}

/**
 * Secondary paid-usage block, copied through as received
 */
export interface ExtraUsage {
  is_enabled: number | boolean | null;
  utilization: number | null;
  used_credits: number | boolean | null;
  monthly_limit: number | boolean | null;
}

/**
 * The single record persisted in the cache file.
 * Flat legacy keys are still written so older readers keep working.
 */
export interface QuotaRecord {
  schema_version: typeof SCHEMA_VERSION;
  source_url: string;
  attempted_at_utc: string;
  fetched_at_utc: string;
  current_session: UsageWindow;
  weekly_limits: UsageWindow;
  extra_usage: ExtraUsage;

  // Legacy flat mirrors
  quota_used_pct: number | null;
  weekly_used_pct: number | null;
  resets_in: string;
  weekly_resets: string;

  updated: string;
  valid: boolean;
  stale: boolean;
  stale_since: string | null;
  stale_reason: string;
  last_success_updated: string;
  error: string;
  api_status_code: number | null;
  consecutive_failures: number;
}

/**
 * Whatever JSON object was found in the cache file. It may come from an older
 * schema or another implementation, so readers go through utils/fields.
 */
export type StoredRecord = JsonObject;

// =============================================================================
// Caller-facing Result
// =============================================================================

/**
 * Flat, all-string result handed to the status line
 */
export interface ProjectedResult {
  pct: string;
  weeklyPct: string;
  resetsIn: string;
  weeklyResetsIn: string;
  stale: 'true' | 'false';
  valid: 'true' | 'false';
}
