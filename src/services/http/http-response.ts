/**
 * Buffered HTTP response returned by HttpSession requests
 */

import { TextDecoder } from 'node:util';
import { HttpStatusError } from '../../core/errors.js';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export class HttpResponse {
  constructor(
    public readonly statusCode: number,
    public readonly headers: ResponseHeaders,
    public readonly content: Buffer,
    public readonly url: string,
    public readonly elapsedMs: number
  ) {}

  /**
   * Single header value; repeated headers are joined with ", "
   */
  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];
    return Array.isArray(value) ? value.join(', ') : value;
  }

  /**
   * Charset from the content-type header, utf-8 when absent
   */
  get encoding(): string {
    const match = /charset=([^;]+)/i.exec(this.header('content-type') ?? '');
    return match ? match[1].trim().replace(/^"|"$/g, '').toLowerCase() : 'utf-8';
  }

  text(): string {
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(this.encoding);
    } catch {
      decoder = new TextDecoder('utf-8');
    }
    return decoder.decode(this.content);
  }

  json<T = unknown>(): T {
    return JSON.parse(this.text());
  }

  /**
   * Cookies set by the response, by name
   */
  get cookies(): Record<string, string> {
    const raw = this.headers['set-cookie'];
    const lines = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
    const cookies: Record<string, string> = {};
    for (const line of lines) {
      const pair = line.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq > 0) {
        cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
      }
    }
    return cookies;
  }

  get isRedirect(): boolean {
    return REDIRECT_STATUSES.has(this.statusCode) && this.header('location') !== undefined;
  }

  get isError(): boolean {
    return this.statusCode >= 400;
  }

  /**
   * @throws HttpStatusError for 4xx and 5xx responses
   */
  raiseForStatus(): this {
    if (this.isError) {
      throw new HttpStatusError(this.statusCode, this.url, this.text());
    }
    return this;
  }
}
