/**
 * Refresh lock marker
 *
 * A text file holding the PID of the refresh in flight. It is advisory: the
 * check and the write are separate steps, so two invocations landing in the
 * same instant may both refresh. That costs one duplicate fetch, never a
 * corrupt cache.
 */

import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import { isProcessAlive } from '../utils/resilience.js';

export class RefreshLock {
  constructor(
    readonly path: string = config.paths.lock,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  /**
   * PID recorded in the marker, or null when absent or unparsable
   */
  owner(): number | null {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8').trim();
    } catch {
      return null;
    }
    if (!/^\d+$/.test(raw)) return null;
    return Number(raw);
  }

  /**
   * True when the marker names a process that is still running.
   * A marker left behind by a dead process does not count.
   */
  isHeld(): boolean {
    const pid = this.owner();
    return pid !== null && this.isAlive(pid);
  }

  acquire(pid: number): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${pid}\n`, 'utf-8');
  }

  /**
   * Remove the marker if it still names `pid`. Another refresh may have
   * claimed it since, and its marker stays.
   */
  release(pid: number): void {
    const current = this.owner();
    if (current !== null && current !== pid) return;
    rmSync(this.path, { force: true });
  }
}
