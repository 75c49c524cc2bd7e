import type { Context } from 'hono';
import type { SessionRecord } from './session.js';

/**
 * Context variables set by the session middleware
 */
export interface SessionVariables {
  session?: SessionRecord;
  sessionToken?: string;
}

export type SessionContext = Context<{ Variables: SessionVariables }>;
