/**
 * Refresh Coordinator
 *
 * Decides, once per status line render, whether the cached usage is good
 * enough and who refreshes it when it is not:
 *
 * - cache younger than the TTL → no network at all
 * - a live refresh already recorded in the lock → leave it alone
 * - no usable cache yet → fetch synchronously so the first render is not blank
 * - stale cache → launch a detached refresh and serve the old record now
 * - launch failed → fetch synchronously instead
 *
 * Whatever happened, the result is projected from the cache file as it is
 * after the decision; a detached refresh is only seen on a later call.
 */

import { RefreshLock } from './cache/lock.js';
import { CacheStore } from './cache/store.js';
import { DetachedProcessLauncher, type RefreshLauncher } from './launcher.js';
import { project } from './projector.js';
import { Refresher } from './refresher.js';
import { UsageApiClient, type UsageSource } from './sources/usageApi.js';
import type { ProjectedResult } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Coordinator');

export type RefreshDecision =
  | 'fresh'              // cache within TTL
  | 'in-flight'          // another live process is refreshing
  | 'cold-start'         // no cache, fetched synchronously
  | 'background'         // detached worker launched
  | 'fallback-sync';     // launch failed, fetched synchronously

export interface CoordinatorDeps {
  store?: CacheStore;
  lock?: RefreshLock;
  source?: UsageSource;
  launcher?: RefreshLauncher;
  now?: () => Date;
}

export class QuotaCoordinator {
  readonly store: CacheStore;
  readonly lock: RefreshLock;
  private readonly refresher: Refresher;
  private readonly launcher: RefreshLauncher;
  private readonly now: () => Date;

  private lastDecision: RefreshDecision | null = null;

  constructor(deps: CoordinatorDeps = {}) {
    this.store = deps.store ?? new CacheStore();
    this.lock = deps.lock ?? new RefreshLock();
    this.launcher = deps.launcher ?? new DetachedProcessLauncher();
    this.now = deps.now ?? (() => new Date());
    this.refresher = new Refresher({
      store: this.store,
      source: deps.source ?? new UsageApiClient(),
      now: this.now,
    });
  }

  /**
   * Projected usage for the status line, refreshing first if needed.
   */
  async get(ttlSeconds: number): Promise<ProjectedResult> {
    this.lastDecision = await this.ensureFresh(ttlSeconds);
    return project(this.store.read(), this.now());
  }

  /**
   * What the most recent get() decided; handy for diagnostics and tests.
   */
  get decision(): RefreshDecision | null {
    return this.lastDecision;
  }

  /**
   * Run one refresh in this process, regardless of TTL or lock state.
   */
  async refreshNow(): Promise<void> {
    await this.refresher.refreshOnce();
  }

  /**
   * Background worker body: refresh, then release the lock marker whatever
   * the outcome. Nobody waits on a detached worker, so a failed write is
   * logged here and the worker still exits cleanly.
   */
  async runWorker(pid: number = process.pid): Promise<void> {
    try {
      await this.refresher.refreshOnce();
    } catch (error) {
      log.error('Background refresh failed:', error);
    } finally {
      this.lock.release(pid);
    }
  }

  private isFresh(ttlSeconds: number): boolean {
    const mtime = this.store.mtime();
    if (!mtime) return false;

    const ageSeconds = (this.now().getTime() - mtime.getTime()) / 1000;
    log.debug(`Cache is ${Math.floor(ageSeconds)}s old (ttl ${ttlSeconds}s)`);
    return ageSeconds < ttlSeconds;
  }

  private async ensureFresh(ttlSeconds: number): Promise<RefreshDecision> {
    // An unreadable cache file counts as no cache at all
    const hasCache = this.store.read() !== null;
    if (hasCache && this.isFresh(ttlSeconds)) return 'fresh';

    if (this.lock.isHeld()) {
      log.debug(`Refresh already running (pid ${this.lock.owner()})`);
      return 'in-flight';
    }

    if (!hasCache) {
      log.debug('No cache yet, fetching synchronously');
      await this.refresher.refreshOnce();
      return 'cold-start';
    }

    const pid = this.launcher.launch();
    if (pid === undefined) {
      log.debug('Background launch failed, fetching synchronously');
      await this.refresher.refreshOnce();
      return 'fallback-sync';
    }

    this.lock.acquire(pid);
    log.debug(`Background refresh launched (pid ${pid})`);
    return 'background';
  }
}
