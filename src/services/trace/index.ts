/**
 * Tracing Module
 *
 * @module services/trace
 */

export * from './instrument.js';
export * from './tracing.js';
