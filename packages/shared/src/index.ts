// Re-export all shared types
export * from './types/auth.js';
export * from './types/project.js';
export * from './types/file.js';
export * from './types/error.js';
