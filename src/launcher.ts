/**
 * Background refresh launcher
 *
 * Starts `<cli> refresh` as a detached child with no stdio, so the status
 * line invocation that launched it can exit right away. The child outlives
 * its parent and releases the lock marker itself when done.
 */

import { spawn } from 'child_process';
import { extname } from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from './utils/logger.js';

const log = createLogger('Launcher');

export interface RefreshLauncher {
  /**
   * Start a background refresh. Returns the worker's PID, or undefined when
   * it could not be started.
   */
  launch(): number | undefined;
}

/**
 * The CLI module next to this one, never the host's own script: a process
 * that embeds the coordinator must still launch a `refresh` this package
 * understands. The extension follows this file so a run from sources under
 * a loader starts `index.ts` with the same execArgv.
 */
export function workerEntry(): string {
  const self = fileURLToPath(import.meta.url);
  return fileURLToPath(new URL(`./index${extname(self)}`, import.meta.url));
}

export class DetachedProcessLauncher implements RefreshLauncher {
  constructor(
    private readonly entry: string = workerEntry(),
    private readonly command: string = 'refresh'
  ) {}

  launch(): number | undefined {
    try {
      const child = spawn(process.execPath, [...process.execArgv, this.entry, this.command], {
        detached: true,
        stdio: 'ignore',
        env: { ...process.env },
      });

      // Spawn failures (ENOENT, EACCES) arrive as an event after the fact
      child.on('error', (err) => {
        log.error(`Background refresh process error: ${err.message}`);
      });
      child.unref();

      if (child.pid === undefined) {
        log.warn('Background refresh did not start');
        return undefined;
      }
      log.debug(`Started background refresh: ${this.entry} ${this.command} (pid ${child.pid})`);
      return child.pid;
    } catch (error) {
      log.warn('Could not start background refresh:', error instanceof Error ? error.message : error);
      return undefined;
    }
  }
}
