// OAuth types
export * from './oauth.js';

// Client types
export * from './client.js';

// Credential types
export * from './token.js';

// Resource owner types
export * from './user.js';

// Hono context types
export * from './hono.js';
