/**
 * HTTP Module
 *
 * Fluent HTTP sessions over undici with retries and verbose logging.
 *
 * @module services/http
 */

export * from './http-client.js';
export * from './http-session.js';
export * from './http-response.js';
