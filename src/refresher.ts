/**
 * Single refresh attempt
 *
 * Fetch once, build the success or degraded record, write it. Fetch failures
 * never escape: they are what degraded records are for.
 */

import type { CacheStore } from './cache/store.js';
import { describeFailure } from './errors.js';
import { buildDegraded, buildSuccess } from './payload.js';
import type { UsageSource } from './sources/usageApi.js';
import type { QuotaRecord } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Refresher');

export interface RefresherDeps {
  store: CacheStore;
  source: UsageSource;
  now?: () => Date;
}

export class Refresher {
  private readonly store: CacheStore;
  private readonly source: UsageSource;
  private readonly now: () => Date;

  constructor(deps: RefresherDeps) {
    this.store = deps.store;
    this.source = deps.source;
    this.now = deps.now ?? (() => new Date());
  }

  async refreshOnce(): Promise<QuotaRecord> {
    const startedAt = this.now();
    let record: QuotaRecord;

    try {
      const body = await this.source.fetchUsage();
      record = buildSuccess(body, startedAt, this.source.url);
      log.info(
        `Fetched usage: 5h=${record.current_session.percent_used ?? '?'}% ` +
        `7d=${record.weekly_limits.percent_used ?? '?'}%`
      );
    } catch (error) {
      const { reason, statusCode } = describeFailure(error);
      record = buildDegraded(this.store.read(), startedAt, reason, statusCode, this.source.url);
      log.info(`Refresh failed (${reason}), ${record.consecutive_failures} in a row`);
    }

    this.store.write(record);
    return record;
  }
}
