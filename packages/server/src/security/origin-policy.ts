import type { TransmissionMode } from '@session-warden/shared';
import { TRANSMISSION_COOKIE, WILDCARD_ORIGIN } from '../config/constants.js';

export interface OriginPolicyOptions {
  allowedOrigins: readonly string[];
  transmission: TransmissionMode;
}

/**
 * Request provenance as seen by the guard
 */
export interface OriginCheckInput {
  origin: string | undefined;
  fetchSite: string | undefined;
}

export type OriginCheckResult = { allowed: true } | { allowed: false; reason: string };

/**
 * Origin policy guard
 *
 * Only meaningful when the session token rides in a cookie, which the browser
 * attaches to cross-site requests on its own. Header transmission needs the
 * client to attach the token explicitly, so the guard lets every request
 * through in that mode.
 */
export class OriginPolicyGuard {
  private readonly allowedOrigins: ReadonlySet<string>;
  private readonly wildcard: boolean;
  private readonly enforced: boolean;

  constructor(options: OriginPolicyOptions) {
    this.enforced = options.transmission === TRANSMISSION_COOKIE;
    this.wildcard = options.allowedOrigins.includes(WILDCARD_ORIGIN);

    if (this.wildcard && this.enforced) {
      throw new Error('Wildcard origin "*" cannot be combined with cookie transmission');
    }

    this.allowedOrigins = new Set(
      options.allowedOrigins.filter((origin) => origin !== WILDCARD_ORIGIN)
    );
  }

  get isEnforced(): boolean {
    return this.enforced;
  }

  /**
   * Exact match against the allow-list
   */
  isAllowedOrigin(origin: string): boolean {
    return this.wildcard || this.allowedOrigins.has(origin);
  }

  /**
   * Decide whether a request may use its session cookie
   *
   * Browsers send Origin on every cross-origin request, so a missing Origin
   * is only refused when Sec-Fetch-Site says the request is cross-site.
   */
  check(input: OriginCheckInput): OriginCheckResult {
    if (!this.enforced) {
      return { allowed: true };
    }

    const fetchSite = input.fetchSite?.trim().toLowerCase();

    if (!input.origin) {
      if (fetchSite === 'cross-site') {
        return { allowed: false, reason: 'Cross-site request without Origin header' };
      }
      return { allowed: true };
    }

    if (this.isAllowedOrigin(input.origin)) {
      return { allowed: true };
    }

    return { allowed: false, reason: `Origin ${input.origin} not in allow-list` };
  }
}
