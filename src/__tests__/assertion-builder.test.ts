import * as jwt from 'jsonwebtoken';
import { AssertionBuilder, buildAssertion, tokenEndpointUrl } from '../assertion';
import { decodeKeyDescription, PrivateSigningKey } from '../keys';
import { testKeyPair } from './fixtures';

const AUDIENCE = 'https://example.com/am/oauth2/access_token';

describe('Assertion builder', () => {
  let key: PrivateSigningKey;

  beforeAll(() => {
    key = decodeKeyDescription(testKeyPair().jwk);
  });

  describe('tokenEndpointUrl', () => {
    it('should give the same URL with or without a trailing slash', () => {
      expect(tokenEndpointUrl('https://example.com/')).toBe(AUDIENCE);
      expect(tokenEndpointUrl('https://example.com')).toBe(AUDIENCE);
    });

    it('should strip repeated trailing slashes', () => {
      expect(tokenEndpointUrl('https://example.com///')).toBe(AUDIENCE);
    });

    it('should keep a path prefix on the base URL', () => {
      expect(tokenEndpointUrl('https://example.com/tenant-a/')).toBe('https://example.com/tenant-a/am/oauth2/access_token');
    });
  });

  describe('build', () => {
    it('should sign exactly iss, sub, aud, exp and jti with RS256', () => {
      const builder = new AssertionBuilder({ now: () => 1700000000500 });

      const assertion = builder.build({
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 899,
        key
      });

      const decoded = jwt.verify(assertion.token, testKeyPair().publicKey, {
        algorithms: ['RS256'],
        ignoreExpiration: true,
        complete: true
      });
      expect(decoded.header).toEqual({ alg: 'RS256', typ: 'JWT' });
      expect(decoded.payload).toEqual({
        iss: 'svc-1',
        sub: 'svc-1',
        aud: AUDIENCE,
        exp: 1700000899,
        jti: assertion.claims.jti
      });
      expect(assertion.claims.exp).toBe(1700000899);
    });

    it('should produce a three-part compact token', () => {
      const assertion = buildAssertion({
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 60,
        key
      });

      const parts = assertion.token.split('.');
      expect(parts).toHaveLength(3);
      parts.forEach(part => expect(part).toMatch(/^[A-Za-z0-9_-]+$/));
    });

    it('should set exp to now plus the lifetime', () => {
      const before = Math.floor(Date.now() / 1000);

      const assertion = buildAssertion({
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 899,
        key
      });

      const after = Math.floor(Date.now() / 1000);
      expect(assertion.claims.exp).toBeGreaterThanOrEqual(before + 899);
      expect(assertion.claims.exp).toBeLessThanOrEqual(after + 899);
    });

    it('should use a fresh 16-byte jti for every assertion', () => {
      const request = {
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 899,
        key
      };
      const builder = new AssertionBuilder();

      const first = builder.build(request);
      const second = builder.build(request);

      expect(first.claims.jti).not.toBe(second.claims.jti);
      expect(first.token).not.toBe(second.token);
      expect(Buffer.from(first.claims.jti, 'base64url')).toHaveLength(16);
      expect(first.claims.jti).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });

    it('should report an entropy failure as AssertionError', () => {
      const builder = new AssertionBuilder({
        randomSource: () => {
          throw new Error('entropy source unavailable');
        }
      });

      expect(() => builder.build({
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 899,
        key
      })).toThrow(expect.objectContaining({
        name: 'AssertionError',
        kind: 'assertion',
        message: 'Failed to generate assertion ID'
      }));
    });

    it('should sign with a key below 2048 bits', () => {
      const { jwk, publicKey } = testKeyPair(1024);
      const smallKey = decodeKeyDescription(jwk);

      const assertion = buildAssertion({
        serviceAccountId: 'svc-1',
        tokenEndpointUrl: AUDIENCE,
        lifetimeSeconds: 899,
        key: smallKey
      });

      expect(smallKey.modulusBits).toBe(1024);
      expect(jwt.verify(assertion.token, publicKey, { algorithms: ['RS256'], audience: AUDIENCE })).toEqual(assertion.claims);
    });

    it('should report a signing failure as AssertionError', () => {
      const signSpy = jest.spyOn(key, 'sign').mockImplementation(() => {
        throw new Error('key unusable');
      });

      try {
        expect(() => buildAssertion({
          serviceAccountId: 'svc-1',
          tokenEndpointUrl: AUDIENCE,
          lifetimeSeconds: 899,
          key
        })).toThrow(expect.objectContaining({
          name: 'AssertionError',
          message: 'Failed to sign assertion: key unusable'
        }));
      } finally {
        signSpy.mockRestore();
      }
    });
  });
});
