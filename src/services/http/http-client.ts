/**
 * HTTP Client
 *
 * Holds client-wide defaults and hands out one HttpSession per request.
 */

import type { HttpConfig } from '../../core/schemas.js';
import { HttpSession, type HttpDefaults } from './http-session.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_RETRY_INTERVAL_MS = 5_000;

export class HttpClient {
  readonly defaults: HttpDefaults;

  constructor(defaults: Partial<HttpDefaults> = { verbose: true }) {
    this.defaults = { timeoutMs: DEFAULT_TIMEOUT_MS, retryIntervalMs: DEFAULT_RETRY_INTERVAL_MS, ...defaults };
  }

  /**
   * Client configured from the `http` section of .toolbox/config.yaml
   */
  static fromConfig(config: HttpConfig, overrides: Partial<HttpDefaults> = {}): HttpClient {
    return new HttpClient({
      baseUrl: config.baseUrl,
      verbose: config.verbose,
      timeoutMs: config.timeoutMs,
      retryIntervalMs: config.retryIntervalMs,
      ...overrides
    });
  }

  create(url: string): HttpSession {
    return new HttpSession(url, this.defaults);
  }
}

export const httpClient = new HttpClient();
