/**
 * StatusQuota Configuration
 * Cached usage quota reader for terminal status lines
 */

import { homedir } from 'os';
import { join } from 'path';

// Cache and lock live at a fixed path every reader on the machine agrees on;
// only the credentials follow the CLI's own config dir override.
const sharedDir = join(homedir(), '.claude');
const credentialsDir = process.env.CLAUDE_CONFIG_DIR || sharedDir;

function asNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export const config = {
  // Files shared with every other reader of the cache on this machine
  paths: {
    cache: process.env.STATUSQUOTA_CACHE_FILE || join(sharedDir, 'quota-data.json'),
    lock: process.env.STATUSQUOTA_LOCK_FILE || join(sharedDir, '.quota-fetch.lock'),
    credentials: process.env.STATUSQUOTA_CREDENTIALS_FILE || join(credentialsDir, '.credentials.json'),
  },

  // Upstream usage endpoint
  api: {
    url: process.env.STATUSQUOTA_API_URL || 'https://api.anthropic.com/api/oauth/usage',
    beta: 'oauth-2025-04-20',
    timeout: asNonNegativeInt(process.env.STATUSQUOTA_TIMEOUT_MS, 20000),  // 20s max per fetch
  },

  // Freshness (seconds)
  ttl: {
    default: asNonNegativeInt(process.env.STATUSQUOTA_TTL, 60),
    active: 60,            // transcript touched recently
    idle: 300,             // nobody typing, refresh less often
    activityWindow: 300,   // how recent a transcript write counts as activity
  },

  // Status line colour thresholds (percent used)
  thresholds: {
    warn: 50,
    critical: 75,
  },

  debug: process.env.STATUSQUOTA_DEBUG === '1' || process.env.STATUSQUOTA_DEBUG === 'true',
};

export type Config = typeof config;
