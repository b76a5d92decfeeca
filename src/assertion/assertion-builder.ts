import { randomBytes } from 'crypto';
import { AssertionError } from '../errors';
import { PrivateSigningKey } from '../keys';
import { AssertionClaims, SignedAssertion } from '../types';

export const TOKEN_ENDPOINT_PATH = '/am/oauth2/access_token';

export interface AssertionRequest {
  serviceAccountId: string;
  tokenEndpointUrl: string;
  lifetimeSeconds: number;
  key: PrivateSigningKey;
}

export interface AssertionBuilderOptions {
  now?: () => number;
  randomSource?: (size: number) => Buffer;
}

/**
 * Token endpoint for a platform base URL. Trailing slashes on the base are ignored.
 */
export function tokenEndpointUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '') + TOKEN_ENDPOINT_PATH;
}

/**
 * Builds single-use self-issued assertions for the JWT-Bearer grant. Nothing is
 * cached: every call draws a new `jti` and stamps a new `exp`.
 */
export class AssertionBuilder {
  private readonly now: () => number;
  private readonly randomSource: (size: number) => Buffer;

  constructor(options: AssertionBuilderOptions = {}) {
    this.now = options.now ?? Date.now;
    this.randomSource = options.randomSource ?? randomBytes;
  }

  build(request: AssertionRequest): SignedAssertion {
    let jti: string;
    try {
      jti = this.randomSource(16).toString('base64url');
    } catch (error) {
      throw new AssertionError('Failed to generate assertion ID', { cause: error });
    }

    const claims: AssertionClaims = {
      iss: request.serviceAccountId,
      sub: request.serviceAccountId,
      aud: request.tokenEndpointUrl,
      exp: Math.floor(this.now() / 1000) + request.lifetimeSeconds,
      jti
    };

    try {
      return { token: request.key.sign(claims), claims };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AssertionError(`Failed to sign assertion: ${reason}`, { cause: error });
    }
  }
}

export function buildAssertion(request: AssertionRequest, options?: AssertionBuilderOptions): SignedAssertion {
  return new AssertionBuilder(options).build(request);
}
