export * from './random.js';
export * from './hash.js';
export * from './opaque-token.js';
