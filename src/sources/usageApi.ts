/**
 * Usage API Client
 *
 * One authenticated GET against the OAuth usage endpoint. The response body
 * carries `five_hour` and `seven_day` blocks ({ utilization, resets_at }) and an
 * optional `extra_usage` block.
 *
 * Failures are thrown as the classes in errors.ts; the refresher turns them
 * into degraded records.
 */

import { config } from '../config.js';
import { TransportError, UpstreamHttpError } from '../errors.js';
import { isJsonObject, type JsonObject } from '../utils/fields.js';
import { createLogger } from '../utils/logger.js';
import { fetchWithTimeout } from '../utils/resilience.js';
import { FileTokenProvider, type TokenProvider } from './credentials.js';

const log = createLogger('UsageApi');

export interface UsageSource {
  readonly url: string;
  fetchUsage(): Promise<JsonObject>;
}

export interface UsageApiOptions {
  url?: string;
  beta?: string;
  timeout?: number;
  tokens?: TokenProvider;
}

export class UsageApiClient implements UsageSource {
  readonly url: string;
  private readonly beta: string;
  private readonly timeout: number;
  private readonly tokens: TokenProvider;

  constructor(options: UsageApiOptions = {}) {
    this.url = options.url ?? config.api.url;
    this.beta = options.beta ?? config.api.beta;
    this.timeout = options.timeout ?? config.api.timeout;
    this.tokens = options.tokens ?? new FileTokenProvider();
  }

  async fetchUsage(): Promise<JsonObject> {
    const token = this.tokens.getToken();

    let response: Response;
    try {
      response = await fetchWithTimeout(this.url, {
        headers: {
          Authorization: `Bearer ${token}`,
          'anthropic-beta': this.beta,
          Accept: 'application/json',
        },
        timeout: this.timeout,
      });
    } catch (error) {
      log.debug(`Request to ${this.url} failed:`, error);
      throw new TransportError(`Request to ${this.url} failed`, { cause: error });
    }

    if (!response.ok) {
      log.debug(`Request to ${this.url} returned HTTP ${response.status}`);
      throw new UpstreamHttpError(this.url, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(`Response from ${this.url} is not valid JSON`, { cause: error });
    }

    if (!isJsonObject(body)) {
      throw new TransportError(`Response from ${this.url} is not a JSON object`);
    }
    return body;
  }
}
