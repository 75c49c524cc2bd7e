// Identifier types
export * from './identifier.js';

// Session, account and authorization token records
export * from './session.js';

// Time source
export * from './clock.js';

// Hono context types
export * from './hono.js';
