// OAuth types
export type * from './oauth.js';

// Client types
export type * from './client.js';

// Token types
export type * from './token.js';

// User types
export type * from './user.js';

// Hono context types
export type * from './hono.js';
