/**
 * Tests for HttpResponse accessors
 */

import { describe, it, expect } from 'vitest';
import { HttpResponse, type ResponseHeaders } from './http-response.js';
import { HttpStatusError } from '../../core/errors.js';

function response(statusCode: number, headers: ResponseHeaders, body = ''): HttpResponse {
  return new HttpResponse(statusCode, headers, Buffer.from(body, 'latin1'), 'https://api.test/x', 12);
}

describe('HttpResponse', () => {
  it('should read the charset from the content type', () => {
    expect(response(200, { 'content-type': 'text/html; charset="ISO-8859-1"' }).encoding).toBe('iso-8859-1');
    expect(response(200, {}).encoding).toBe('utf-8');
  });

  it('should decode text with the declared charset', () => {
    const latin = response(200, { 'content-type': 'text/plain; charset=iso-8859-1' }, 'caf\xe9');
    expect(latin.text()).toBe('café');
  });

  it('should parse JSON bodies', () => {
    expect(response(200, {}, '{"ok":true}').json()).toEqual({ ok: true });
  });

  it('should collect cookies from set-cookie headers', () => {
    const withCookies = response(200, { 'set-cookie': ['session=abc; Path=/; HttpOnly', 'theme=dark'] });
    expect(withCookies.cookies).toEqual({ session: 'abc', theme: 'dark' });
  });

  it('should only count redirects that carry a location', () => {
    expect(response(302, { location: '/next' }).isRedirect).toBe(true);
    expect(response(302, {}).isRedirect).toBe(false);
    expect(response(200, { location: '/next' }).isRedirect).toBe(false);
  });

  it('should raise for client and server errors only', () => {
    const ok = response(204, {});
    expect(ok.raiseForStatus()).toBe(ok);
    expect(() => response(404, {}).raiseForStatus()).toThrow("Client error '404' for url 'https://api.test/x'");
    expect(() => response(503, {}).raiseForStatus()).toThrow(HttpStatusError);
  });
});
