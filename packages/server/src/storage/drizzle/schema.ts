import { pgTable, text, timestamp, jsonb, boolean, index } from 'drizzle-orm/pg-core';
import type { SessionAttributes } from '../../types/session.js';

// Identifiers are stored in their base64url wire form

// Sessions table
export const sessions = pgTable('sessions', {
  id: text('id').primaryKey(),
  subjectId: text('subject_id').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  attributes: jsonb('attributes').$type<SessionAttributes>().notNull().default({}),
}, (table) => ({
  sessionsSubjectIdIdx: index('idx_sessions_subject_id').on(table.subjectId),
  // Cleanup sweep
  sessionsExpiresAtIdx: index('idx_sessions_expires_at').on(table.expiresAt),
}));

// Accounts table
export const accounts = pgTable('accounts', {
  id: text('id').primaryKey(),
  credentialId: text('credential_id').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
});

// Authorization tokens table
export const authorizationTokens = pgTable('authorization_tokens', {
  id: text('id').primaryKey(),
  subjectId: text('subject_id').notNull(),
  purpose: text('purpose').notNull(),
  oneTime: boolean('one_time').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
}, (table) => ({
  authorizationTokensExpiresAtIdx: index('idx_authorization_tokens_expires_at').on(table.expiresAt),
}));

export type SessionRow = typeof sessions.$inferSelect;
export type AccountRow = typeof accounts.$inferSelect;
export type AuthorizationTokenRow = typeof authorizationTokens.$inferSelect;
