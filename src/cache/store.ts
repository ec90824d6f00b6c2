/**
 * StatusQuota Cache Store
 *
 * One JSON record in one file. Every write replaces the whole file; a missing,
 * unreadable or corrupt file reads as "no cache" and the next refresh behaves
 * like a cold start.
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import type { QuotaRecord, StoredRecord } from '../types.js';
import { isJsonObject } from '../utils/fields.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('CacheStore');

export class CacheStore {
  constructor(readonly path: string = config.paths.cache) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Last-modified time of the cache file, or null when there is none
   */
  mtime(): Date | null {
    try {
      return statSync(this.path).mtime;
    } catch {
      return null;
    }
  }

  read(): StoredRecord | null {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isJsonObject(parsed)) return parsed;
      log.debug(`Ignoring non-object cache at ${this.path}`);
    } catch (error) {
      log.debug(`Ignoring corrupt cache at ${this.path}:`, error instanceof Error ? error.message : error);
    }
    return null;
  }

  write(record: QuotaRecord): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
  }
}
