// Re-export all shared types
export * from './types/session.js';
export * from './types/errors.js';
export * from './types/authorization-token.js';
