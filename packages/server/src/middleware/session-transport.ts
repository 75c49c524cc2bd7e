import type { Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import type { CookieSameSite, TransmissionMode } from '@session-warden/shared';
import {
  COOKIE_ISOLATION_SUFFIX_LENGTH,
  HEADER_AUTHORIZATION,
  HEADER_ORIGIN,
  TRANSMISSION_COOKIE,
} from '../config/constants.js';
import { sha256Base64Url } from '../crypto/hash.js';

export interface SessionTransportOptions {
  transmission: TransmissionMode;
  cookieName: string;
  sameSite: CookieSameSite;
  /**
   * Suffix the cookie name with a digest of the requesting origin so
   * several front ends on one host keep separate sessions
   */
  isolation: boolean;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Origin the request was made from: the Origin header, or the server's own
 * origin for same-origin requests that omit it
 */
export function requestOrigin(c: Context): string {
  return c.req.header(HEADER_ORIGIN) ?? new URL(c.req.url).origin;
}

export function sessionCookieName(options: SessionTransportOptions, origin: string): string {
  if (!options.isolation) {
    return options.cookieName;
  }
  return `${options.cookieName}_${sha256Base64Url(origin).slice(0, COOKIE_ISOLATION_SUFFIX_LENGTH)}`;
}

/**
 * Extract the presented session token for the configured transmission mode
 */
export function readSessionToken(c: Context, options: SessionTransportOptions): string | undefined {
  if (options.transmission === TRANSMISSION_COOKIE) {
    const token = getCookie(c, sessionCookieName(options, requestOrigin(c)));
    return token ? token : undefined;
  }

  const header = c.req.header(HEADER_AUTHORIZATION);
  return header ? BEARER_PATTERN.exec(header)?.[1] : undefined;
}

export function writeSessionCookie(
  c: Context,
  options: SessionTransportOptions,
  token: string,
  expiresAt: Date,
  now: Date
): void {
  setCookie(c, sessionCookieName(options, requestOrigin(c)), token, {
    path: '/',
    httpOnly: true,
    secure: true,
    sameSite: options.sameSite,
    maxAge: Math.max(0, Math.floor((expiresAt.getTime() - now.getTime()) / 1000)),
    expires: expiresAt,
  });
}

export function clearSessionCookie(c: Context, options: SessionTransportOptions): void {
  setCookie(c, sessionCookieName(options, requestOrigin(c)), '', {
    path: '/',
    httpOnly: true,
    secure: true,
    sameSite: options.sameSite,
    maxAge: 0,
    expires: new Date(0),
  });
}
