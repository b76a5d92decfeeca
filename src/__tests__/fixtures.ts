import { generateKeyPairSync, KeyObject } from 'crypto';
import { RsaKeyDescription } from '../types';
import { TokenHttpRequestInit, TokenHttpResponse } from '../exchange';

export interface TestKeyPair {
  jwk: RsaKeyDescription;
  publicKey: KeyObject;
}

const cache = new Map<number, TestKeyPair>();

/**
 * Fresh RSA key as a private JWK plus its public half, generated once per size
 * per test file.
 */
export function testKeyPair(modulusLength = 2048): TestKeyPair {
  const cached = cache.get(modulusLength);
  if (cached) {
    return cached;
  }

  const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength });
  const exported = privateKey.export({ format: 'jwk' });
  const member = (name: string): string => {
    const value = exported[name];
    if (typeof value !== 'string') {
      throw new Error(`generated JWK has no "${name}"`);
    }
    return value;
  };

  const pair: TestKeyPair = {
    jwk: {
      kty: 'RSA',
      n: member('n'),
      e: member('e'),
      d: member('d'),
      p: member('p'),
      q: member('q'),
      dp: member('dp'),
      dq: member('dq'),
      qi: member('qi'),
      kid: 'test-key-id',
      use: 'sig'
    },
    publicKey
  };
  cache.set(modulusLength, pair);
  return pair;
}

export function httpResponse(status: number, body: string): TokenHttpResponse {
  return {
    status,
    text: () => Promise.resolve(body)
  };
}

export function mockTokenFetch() {
  return jest.fn<Promise<TokenHttpResponse>, [string, TokenHttpRequestInit]>();
}
