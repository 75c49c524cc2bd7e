export { createSessionRoutes, toSessionView, type SessionRoutesOptions } from './sessions.js';
export { createPasswordRoutes, type PasswordRoutesOptions } from './password.js';
export {
  createAuthorizationTokenRoutes,
  type AuthorizationTokenRoutesOptions,
} from './authorization-tokens.js';
