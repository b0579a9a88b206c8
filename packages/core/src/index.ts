/**
 * @watchlist-eval/core - Data model, reply schemas and label decoding
 */

export * from './types.js';
export * from './schemas.js';
export * from './labels.js';
