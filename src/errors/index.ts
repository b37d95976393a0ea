export * from './error-codes.js';
export * from './oauth-error.js';
export * from './bearer-error.js';
