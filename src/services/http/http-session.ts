/**
 * HTTP Session
 *
 * A fluent builder bound to one URL. Options accumulate through the
 * builder methods and are sent by one of the request methods, with
 * retries for server errors and transport failures.
 */

import { setTimeout as sleep } from 'timers/promises';
import { Agent, FormData, errors, request, type Dispatcher } from 'undici';
import { ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { HttpResponse } from './http-response.js';

const log = logger.child('[http]');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/** Value accepted by addQuery/addForm; arrays and objects are sent as JSON */
export type FieldInput = string | number | boolean | unknown[] | Record<string, unknown> | null | undefined;

export type FieldValue = string | number | boolean;

export interface HttpFile {
  content: Buffer | string;
  filename?: string;
  contentType?: string;
}

export type FileInput = Buffer | string | HttpFile;

/**
 * Client-wide defaults shared by every session
 */
export interface HttpDefaults {
  baseUrl?: string;
  verbose?: boolean;
  timeoutMs: number;
  /** Wait between attempts when a session sets no interval of its own */
  retryIntervalMs?: number;
  /** undici dispatcher used instead of the global one */
  dispatcher?: Dispatcher;
}

/**
 * Per-session request options
 */
export interface HttpOptions {
  url: string;
  verbose?: boolean;
  timeoutMs?: number;
  maxRetries?: number;
  retryIntervalMs?: number;
  query?: Record<string, FieldValue>;
  content?: string | Buffer;
  form?: Record<string, FieldValue>;
  json?: Record<string, unknown>;
  files?: Record<string, FileInput>;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  redirects: boolean;
  verify: boolean;
}

type DictKey = 'query' | 'form' | 'headers' | 'cookies' | 'files';

export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Buffer | FormData;
  timeoutMs: number;
}

const MAX_REDIRECTS = 10;

const CREDENTIAL_HEADERS = new Set(['authorization', 'cookie']);

const RETRYABLE_UNDICI_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET'
]);

const RETRYABLE_SYSTEM_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT']);

/**
 * Whether a failed attempt is worth repeating: timeouts, refused or
 * dropped connections
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof errors.UndiciError) {
    return RETRYABLE_UNDICI_CODES.has(error.code);
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return RETRYABLE_SYSTEM_CODES.has(error.code);
  }
  return false;
}

function toFieldValue(value: Exclude<FieldInput, null | undefined>): FieldValue {
  if (Array.isArray(value) || typeof value === 'object') {
    return JSON.stringify(value);
  }
  return value;
}

function isHttpMethod(method: string): method is HttpMethod {
  return ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'].includes(method);
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some(key => key.toLowerCase() === lower);
}

function toBlob(file: FileInput): { blob: Blob; filename?: string } {
  if (typeof file === 'string' || Buffer.isBuffer(file)) {
    return { blob: new Blob([file]) };
  }
  return {
    blob: new Blob([file.content], file.contentType ? { type: file.contentType } : undefined),
    filename: file.filename
  };
}

export class HttpSession {
  private readonly _options: HttpOptions;
  private ownedAgent: Dispatcher | null = null;

  constructor(url: string, public readonly defaults: HttpDefaults, options?: Partial<HttpOptions>) {
    this._options = { redirects: true, verify: true, ...options, url };
  }

  get options(): HttpOptions {
    return this._options;
  }

  verbose(verbose: boolean): this {
    this._options.verbose = verbose;
    return this;
  }

  retry(maxRetries: number, retryIntervalMs = 3_000): this {
    this._options.maxRetries = maxRetries;
    this._options.retryIntervalMs = retryIntervalMs;
    return this;
  }

  timeout(timeoutMs: number): this {
    this._options.timeoutMs = timeoutMs;
    return this;
  }

  redirects(allow: boolean): this {
    this._options.redirects = allow;
    return this;
  }

  verify(verify: boolean): this {
    this._options.verify = verify;
    return this;
  }

  addHeader(name: string, value: string | number | boolean | null | undefined): this {
    if (!name || value === null || value === undefined) {
      return this;
    }
    this.setDictValue('headers', name, String(value));
    return this;
  }

  addHeaders(headers: Record<string, string> | null | undefined): this {
    if (!headers) {
      return this;
    }
    for (const [name, value] of Object.entries(headers)) {
      this.setDictValue('headers', name, value);
    }
    return this;
  }

  addCookie(name: string, value: string | number | boolean | null | undefined): this {
    if (!name || value === null || value === undefined) {
      return this;
    }
    this.setDictValue('cookies', name, String(value));
    return this;
  }

  addQuery(data: Record<string, FieldInput>): this;
  addQuery(name: string, value: FieldInput): this;
  addQuery(name: string | Record<string, FieldInput>, value?: FieldInput): this {
    return this.addItem('query', name, value);
  }

  addForm(data: Record<string, FieldInput>): this;
  addForm(name: string, value: FieldInput): this;
  addForm(name: string | Record<string, FieldInput>, value?: FieldInput): this {
    return this.addItem('form', name, value);
  }

  addContent(content: string | Buffer | null | undefined): this {
    if (!content || content.length === 0) {
      return this;
    }
    this._options.content = content;
    return this;
  }

  addFile(name: string, file: FileInput | null | undefined): this {
    if (file === null || file === undefined) {
      return this;
    }
    this.setDictValue('files', name, file);
    return this;
  }

  /**
   * Merge keys into the JSON body
   *
   * @throws ValidationError when given something other than a plain object
   */
  addJson(data: Record<string, unknown> | null | undefined): this {
    if (data === null || data === undefined) {
      return this;
    }
    if (typeof data !== 'object' || Array.isArray(data)) {
      throw new ValidationError('json data must be an object', 'json');
    }
    if (Object.keys(data).length === 0) {
      return this;
    }
    this._options.json = { ...this._options.json, ...data };
    return this;
  }

  private setDictValue(key: 'files', name: string, value: FileInput): void;
  private setDictValue(key: Exclude<DictKey, 'files'>, name: string, value: FieldValue): void;
  private setDictValue(key: DictKey, name: string, value: FieldValue | FileInput): void {
    switch (key) {
      case 'headers':
      case 'cookies':
        this._options[key] = { ...this._options[key], [name]: String(value) };
        break;
      case 'files':
        if (typeof value === 'number' || typeof value === 'boolean') {
          throw new ValidationError('file content must be a string, Buffer or HttpFile', name);
        }
        this._options.files = { ...this._options.files, [name]: value };
        break;
      default:
        if (typeof value === 'object') {
          throw new ValidationError(`${key} values must be scalars`, name);
        }
        this._options[key] = { ...this._options[key], [name]: value };
    }
  }

  private addItem(key: 'query' | 'form', name: string | Record<string, FieldInput>, value?: FieldInput): this {
    if (typeof name !== 'string') {
      for (const [itemName, itemValue] of Object.entries(name)) {
        this.addItem(key, itemName, itemValue);
      }
      return this;
    }
    if (!name || value === null || value === undefined) {
      return this;
    }
    this.setDictValue(key, name, toFieldValue(value));
    return this;
  }

  get(): Promise<HttpResponse> {
    return this.request('GET');
  }

  post(): Promise<HttpResponse> {
    return this.request('POST');
  }

  put(): Promise<HttpResponse> {
    return this.request('PUT');
  }

  patch(): Promise<HttpResponse> {
    return this.request('PATCH');
  }

  delete(): Promise<HttpResponse> {
    return this.request('DELETE');
  }

  /**
   * Release the agent this session created for itself, if any
   */
  async close(): Promise<void> {
    if (this.ownedAgent) {
      const agent = this.ownedAgent;
      this.ownedAgent = null;
      await agent.close();
    }
  }

  /**
   * Send the request, retrying 5xx responses and transport failures up
   * to `maxRetries` extra times
   */
  async request(method: string): Promise<HttpResponse> {
    if (!method) {
      throw new ValidationError('method cannot be empty', 'method');
    }
    const verb = method.toUpperCase();
    if (!isHttpMethod(verb)) {
      throw new ValidationError(`Unsupported HTTP method: ${method}`, 'method');
    }

    const prepared = this.prepare(verb);
    this.logVerbose(() => `${verb} ${prepared.url}`);
    this.logVerbose(() => JSON.stringify(this.formatLogParams(prepared)));

    const attempts = (this._options.maxRetries ?? 0) + 1;
    const retryIntervalMs = this._options.retryIntervalMs ?? this.defaults.retryIntervalMs;

    try {
      for (let attempt = 1; ; attempt++) {
        const isLastAttempt = attempt === attempts;
        try {
          const response = await this.send(prepared);
          if (response.statusCode >= 500) {
            if (!isLastAttempt) {
              log.debug(
                `${verb} ${this._options.url} Server returned status code ${response.statusCode} ready to retry ${attempt} times`
              );
              await this.pause(retryIntervalMs);
              continue;
            }
            log.debug(`${verb} ${this._options.url} The server returns a status code ${response.statusCode}`);
          }
          this.logVerbose(() => this.formatLogResponse(response));
          return response;
        } catch (error) {
          if (!isRetryableError(error)) {
            throw error;
          }
          const message = error instanceof Error ? error.message : String(error);
          if (isLastAttempt) {
            log.debug(`${verb} ${this._options.url} ${message} Maximum number of retries reached`);
            throw error;
          }
          log.debug(`${verb} ${this._options.url} ${message} Ready to retry ${attempt} times`);
          await this.pause(retryIntervalMs);
        }
      }
    } finally {
      await this.close();
    }
  }

  private async pause(ms: number | undefined): Promise<void> {
    if (ms !== undefined && ms > 0) {
      await sleep(ms);
    }
  }

  private dispatcher(): Dispatcher | undefined {
    if (this.defaults.dispatcher) {
      return this.defaults.dispatcher;
    }
    if (this._options.verify) {
      return undefined;
    }
    if (!this.ownedAgent) {
      this.ownedAgent = this.createInsecureAgent();
    }
    return this.ownedAgent;
  }

  /**
   * Dispatcher that skips TLS certificate checks, owned by this session
   */
  protected createInsecureAgent(): Dispatcher {
    return new Agent({ connect: { rejectUnauthorized: false } });
  }

  /**
   * One attempt, following redirects when allowed
   */
  private async send(prepared: PreparedRequest): Promise<HttpResponse> {
    const started = Date.now();
    let current = prepared;

    for (let hops = 0; ; hops++) {
      const { statusCode, headers, body } = await request(current.url, {
        method: current.method,
        headers: current.headers,
        body: current.body,
        headersTimeout: current.timeoutMs,
        bodyTimeout: current.timeoutMs,
        dispatcher: this.dispatcher()
      });
      const content = Buffer.from(await body.arrayBuffer());
      const response = new HttpResponse(statusCode, headers, content, current.url, Date.now() - started);

      if (!this._options.redirects || !response.isRedirect || hops >= MAX_REDIRECTS) {
        return response;
      }
      current = this.redirectTarget(current, response);
    }
  }

  private redirectTarget(previous: PreparedRequest, response: HttpResponse): PreparedRequest {
    const location = response.header('location') ?? '';
    const target = new URL(location, previous.url);
    const crossOrigin = target.origin !== new URL(previous.url).origin;
    // 307 and 308 repeat the request as-is; the others become a bodiless GET
    const repeat = response.statusCode === 307 || response.statusCode === 308;

    // Credentials stay with the origin they were set for
    const headers = Object.fromEntries(
      Object.entries(previous.headers).filter(([name]) => {
        const lower = name.toLowerCase();
        if (crossOrigin && CREDENTIAL_HEADERS.has(lower)) {
          return false;
        }
        return repeat || lower !== 'content-type';
      })
    );

    if (repeat) {
      return { ...previous, url: target.toString(), headers };
    }
    return {
      method: previous.method === 'HEAD' ? 'HEAD' : 'GET',
      url: target.toString(),
      headers,
      timeoutMs: previous.timeoutMs
    };
  }

  /**
   * Absolute URL for this session: absolute URLs pass through, relative
   * ones are joined to the base URL
   */
  buildUrl(): string {
    const url = this._options.url;
    if (url.startsWith('http')) {
      return url;
    }
    if (this.defaults.baseUrl) {
      const base = this.defaults.baseUrl.replace(/^[/\\]+|[/\\]+$/g, '');
      return `${base}/${url.replace(/^[/\\]+/, '')}`;
    }
    return url;
  }

  private buildUrlWithQuery(): string {
    const raw = this.buildUrl();
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      throw new ValidationError(`Invalid URL: ${raw}`, 'url');
    }
    for (const [name, value] of Object.entries(this._options.query ?? {})) {
      url.searchParams.set(name, String(value));
    }
    return url.toString();
  }

  private prepare(method: HttpMethod): PreparedRequest {
    const headers: Record<string, string> = { ...this._options.headers };
    const cookies = this._options.cookies;
    if (cookies && Object.keys(cookies).length > 0 && !hasHeader(headers, 'cookie')) {
      headers.cookie = Object.entries(cookies).map(([name, value]) => `${name}=${value}`).join('; ');
    }

    const prepared: PreparedRequest = {
      method,
      url: this.buildUrlWithQuery(),
      headers,
      timeoutMs: this._options.timeoutMs ?? this.defaults.timeoutMs
    };

    const setBody = (body: string | Buffer | FormData, contentType?: string): void => {
      prepared.body = body;
      if (contentType && !hasHeader(headers, 'content-type')) {
        headers['content-type'] = contentType;
      }
    };

    const { content, form, files, json } = this._options;
    const hasForm = form !== undefined && Object.keys(form).length > 0;
    const hasFiles = files !== undefined && Object.keys(files).length > 0;

    if (method === 'POST' || method === 'PUT' || method === 'PATCH') {
      if (content !== undefined) {
        setBody(content);
      } else if (hasFiles) {
        const data = new FormData();
        for (const [name, value] of Object.entries(form ?? {})) {
          data.append(name, String(value));
        }
        for (const [name, file] of Object.entries(files)) {
          const { blob, filename } = toBlob(file);
          data.append(name, blob, filename ?? name);
        }
        setBody(data);
      } else if (hasForm) {
        const encoded = new URLSearchParams(
          Object.entries(form).map(([name, value]): [string, string] => [name, String(value)])
        );
        setBody(encoded.toString(), 'application/x-www-form-urlencoded');
      } else if (json !== undefined) {
        setBody(JSON.stringify(json), 'application/json');
      }
      return prepared;
    }

    if (method === 'GET' || method === 'DELETE') {
      if (hasForm) {
        log.warn(`${method} Request not to use addForm to add parameters, ignored`);
      }
      if (hasFiles) {
        log.warn(`${method} Request not to use addFile to add parameters, ignored`);
      }
    }
    if (json !== undefined) {
      setBody(JSON.stringify(json), 'application/json');
    }
    return prepared;
  }

  private logVerbose(message: () => string): void {
    if (this._options.verbose === false) {
      return;
    }
    if (this.defaults.verbose !== true) {
      return;
    }
    log.info(message());
  }

  /**
   * Request parameters for the verbose log, minus the URL, empty values
   * and any Authorization header
   */
  formatLogParams(prepared: PreparedRequest): Record<string, unknown> {
    const headers = Object.fromEntries(
      Object.entries(prepared.headers).filter(([name]) => name.toLowerCase() !== 'authorization')
    );
    const candidates: Record<string, unknown> = {
      headers,
      timeoutMs: prepared.timeoutMs,
      redirects: this._options.redirects,
      form: this._options.form,
      files: this._options.files ? Object.keys(this._options.files) : undefined,
      json: this._options.json
    };
    const formatted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(candidates)) {
      if (value === undefined || value === null || value === false) {
        continue;
      }
      if (typeof value === 'object' && value !== null && Object.keys(value).length === 0) {
        continue;
      }
      formatted[key] = value;
    }
    return formatted;
  }

  formatLogResponse(response: HttpResponse): string {
    const contentType = response.header('content-type');
    if (contentType?.includes('application/json')) {
      return `${response.statusCode} (${response.elapsedMs}ms) ${response.text()}`;
    }
    return `${response.statusCode} (${response.elapsedMs}ms) content-type:${contentType}, ` +
      `content-disposition:${response.header('content-disposition')}`;
  }
}
