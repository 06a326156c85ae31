/**
 * Secret Message Module
 *
 * @module services/decode
 */

export * from './grid.js';
export * from './secret-message-service.js';
