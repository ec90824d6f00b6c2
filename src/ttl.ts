/**
 * Adaptive refresh interval
 *
 * While someone is actively working (the session transcript was written
 * recently) the status line refreshes every minute; otherwise every five.
 */

import { statSync } from 'fs';
import { config } from './config.js';

export function chooseTtl(transcriptPath: string | undefined, now: Date = new Date()): number {
  if (!transcriptPath) return config.ttl.idle;

  let modified: Date;
  try {
    modified = statSync(transcriptPath).mtime;
  } catch {
    return config.ttl.idle;
  }

  const ageSeconds = (now.getTime() - modified.getTime()) / 1000;
  return ageSeconds < config.ttl.activityWindow ? config.ttl.active : config.ttl.idle;
}
