import { describe, it, expect } from 'vitest';
import { OriginPolicyGuard } from '../../security/origin-policy.js';

const APP_ORIGIN = 'https://app.example.com';

describe('OriginPolicyGuard', () => {
  describe('cookie transmission', () => {
    const guard = new OriginPolicyGuard({ allowedOrigins: [APP_ORIGIN], transmission: 'cookie' });

    it('should allow a listed origin', () => {
      expect(guard.check({ origin: APP_ORIGIN, fetchSite: 'same-site' })).toEqual({ allowed: true });
    });

    it('should compare origins exactly', () => {
      expect(guard.check({ origin: 'https://app.example.com:8443', fetchSite: undefined }).allowed).toBe(
        false
      );
      expect(guard.check({ origin: 'http://app.example.com', fetchSite: undefined }).allowed).toBe(false);
    });

    it('should refuse an unlisted origin', () => {
      expect(guard.check({ origin: 'https://evil.example.net', fetchSite: 'cross-site' })).toEqual({
        allowed: false,
        reason: 'Origin https://evil.example.net not in allow-list',
      });
    });

    it('should refuse a cross-site request without Origin', () => {
      expect(guard.check({ origin: undefined, fetchSite: ' Cross-Site ' })).toEqual({
        allowed: false,
        reason: 'Cross-site request without Origin header',
      });
    });

    it('should allow a request without Origin from the same site or no browser', () => {
      expect(guard.check({ origin: undefined, fetchSite: 'same-origin' }).allowed).toBe(true);
      expect(guard.check({ origin: undefined, fetchSite: undefined }).allowed).toBe(true);
    });

    it('should refuse every origin when the list is empty', () => {
      const closed = new OriginPolicyGuard({ allowedOrigins: [], transmission: 'cookie' });

      expect(closed.isEnforced).toBe(true);
      expect(closed.check({ origin: APP_ORIGIN, fetchSite: undefined }).allowed).toBe(false);
    });

    it('should refuse a wildcard', () => {
      expect(() => new OriginPolicyGuard({ allowedOrigins: ['*'], transmission: 'cookie' })).toThrow(
        'Wildcard origin "*" cannot be combined with cookie transmission'
      );
    });
  });

  describe('header transmission', () => {
    it('should let every request through', () => {
      const guard = new OriginPolicyGuard({ allowedOrigins: [], transmission: 'header' });

      expect(guard.isEnforced).toBe(false);
      expect(guard.check({ origin: 'https://evil.example.net', fetchSite: 'cross-site' })).toEqual({
        allowed: true,
      });
    });

    it('should accept a wildcard list', () => {
      const guard = new OriginPolicyGuard({ allowedOrigins: ['*'], transmission: 'header' });

      expect(guard.isAllowedOrigin('https://anything.example.org')).toBe(true);
    });
  });
});
