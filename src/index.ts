#!/usr/bin/env node
/**
 * StatusQuota - cached usage quota for terminal status lines
 *
 * Commands:
 *   get [ttl] [--format=json|env] [--transcript=<path>]
 *   statusline [ttl] [--no-color] [--transcript=<path>]
 *   status        force one refresh and print a summary
 *   check         verify the OAuth credentials are readable
 *   refresh       background worker (launched by get/statusline)
 */

import { CacheStore } from './cache/store.js';
import { config } from './config.js';
import { QuotaCoordinator } from './coordinator.js';
import { formatStatusReport, toEnvLines, toWire } from './output.js';
import { project } from './projector.js';
import { FileTokenProvider } from './sources/credentials.js';
import { renderStatusLine } from './statusline.js';
import { chooseTtl } from './ttl.js';
import type { ProjectedResult } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('StatusQuota');

function option(args: string[], name: string): string | undefined {
  return args.find(a => a.startsWith(`--${name}=`))?.split('=').slice(1).join('=');
}

/**
 * TTL from the first positional argument, then the transcript activity,
 * then the configured default.
 */
function resolveTtl(args: string[]): number {
  const positional = args.slice(1).find(a => !a.startsWith('--'));
  if (positional !== undefined && /^\d+$/.test(positional)) {
    return Number(positional);
  }
  const transcript = option(args, 'transcript');
  return transcript ? chooseTtl(transcript) : config.ttl.default;
}

/**
 * The status line must always get an answer; any unexpected error degrades
 * to whatever the cache holds right now.
 */
async function getResult(coordinator: QuotaCoordinator, ttl: number): Promise<ProjectedResult> {
  try {
    return await coordinator.get(ttl);
  } catch (error) {
    log.error('Quota lookup failed:', error);
    return project(coordinator.store.read());
  }
}

async function runGet(args: string[]): Promise<void> {
  const coordinator = new QuotaCoordinator();
  const result = await getResult(coordinator, resolveTtl(args));

  if (option(args, 'format') === 'env') {
    console.log(toEnvLines(result).join('\n'));
  } else {
    console.log(JSON.stringify(toWire(result)));
  }
}

async function runStatusLine(args: string[]): Promise<void> {
  const coordinator = new QuotaCoordinator();
  const result = await getResult(coordinator, resolveTtl(args));
  const line = renderStatusLine(result, { color: !args.includes('--no-color') });
  if (line) console.log(line);
}

async function runWorker(): Promise<void> {
  const coordinator = new QuotaCoordinator();
  await coordinator.runWorker(process.pid);
}

async function showStatus(): Promise<void> {
  const coordinator = new QuotaCoordinator();
  const now = new Date();

  console.log('📊 Quota Status');
  console.log('─'.repeat(50));

  await coordinator.refreshNow();
  const record = coordinator.store.read();
  for (const line of formatStatusReport(record, project(record, now), now)) {
    console.log(line);
  }

  console.log('');
  console.log('📋 Configuration');
  console.log('─'.repeat(50));
  console.log(`Cache:       ${config.paths.cache}`);
  console.log(`Lock:        ${config.paths.lock}`);
  console.log(`Credentials: ${config.paths.credentials}`);
  console.log(`Endpoint:    ${config.api.url}`);
}

function runCheck(): void {
  const tokens = new FileTokenProvider();
  try {
    tokens.getToken();
    console.log(`  ✓ OAuth token found in ${tokens.path}`);
  } catch (error) {
    console.log(`  ⚠ ${error instanceof Error ? error.message : String(error)}`);
    console.log("  ⚠ Run 'claude login' first.");
    process.exitCode = 1;
  }

  const store = new CacheStore();
  console.log(store.exists() ? `  ✓ Cache file at ${store.path}` : `  ⚠ No cache file yet at ${store.path}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] || 'get';

  switch (command) {
    case 'get':
      await runGet(args);
      break;

    case 'statusline':
      await runStatusLine(args);
      break;

    case 'refresh':
      await runWorker();
      break;

    case 'status':
      await showStatus();
      break;

    case 'check':
      runCheck();
      break;

    default:
      console.log(`Unknown command: ${command}`);
      console.log('Usage: statusquota [get|statusline|status|check|refresh] [ttl] [options]');
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  log.error('Fatal:', error);
  process.exitCode = 1;
});
