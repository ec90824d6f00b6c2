/**
 * Status line rendering
 * e.g. "5h:68% ↻1h12m 7d:31% ↻4d2h", coloured by how much is used.
 */

import { config } from './config.js';
import type { ProjectedResult } from './types.js';

const ANSI = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  reset: '\x1b[0m',
} as const;

export interface RenderOptions {
  color?: boolean;
  warnAt?: number;
  criticalAt?: number;
}

function colorFor(pct: number, warnAt: number, criticalAt: number): string {
  if (pct > criticalAt) return ANSI.red;
  if (pct > warnAt) return ANSI.yellow;
  return ANSI.green;
}

/**
 * One window segment: "5h:68%", "⚠" when stale, " ↻1h12m" when the reset is known.
 * Empty when there is no percentage to show.
 */
export function renderSegment(
  label: string,
  pct: string,
  resetsIn: string,
  stale: boolean,
  options: RenderOptions = {}
): string {
  const value = Number(pct);
  if (pct === '' || !Number.isFinite(value)) return '';

  let text = `${label}:${pct}%`;
  if (stale) text += '⚠';
  if (resetsIn) text += ` ↻${resetsIn}`;

  if (options.color === false) return text;
  const warnAt = options.warnAt ?? config.thresholds.warn;
  const criticalAt = options.criticalAt ?? config.thresholds.critical;
  return `${colorFor(value, warnAt, criticalAt)}${text}${ANSI.reset}`;
}

export function renderStatusLine(result: ProjectedResult, options: RenderOptions = {}): string {
  const stale = result.stale === 'true';
  return [
    renderSegment('5h', result.pct, result.resetsIn, stale, options),
    renderSegment('7d', result.weeklyPct, result.weeklyResetsIn, stale, options),
  ]
    .filter(Boolean)
    .join(' ');
}
