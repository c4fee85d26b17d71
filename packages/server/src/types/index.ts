// Token types
export * from './token.js';

// User types
export * from './user.js';

// Project, folder and file types
export * from './project.js';

// Hono context types
export * from './hono.js';
