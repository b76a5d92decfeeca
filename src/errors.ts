/**
 * Token request error taxonomy
 *
 * Every failure in the token pipeline surfaces as one of these classes so that
 * callers can tell a configuration problem from a bad key, a rejected request
 * or a network failure without parsing messages.
 */

export type TokenErrorKind =
  | 'config'
  | 'key-material'
  | 'assertion'
  | 'transport'
  | 'response-parse'
  | 'exchange';

const REMEDIATION: Record<TokenErrorKind, string> = {
  'config': 'Fix the token configuration and try again.',
  'key-material': 'The service account key is unusable. Regenerate the key and update the configuration.',
  'assertion': 'Signing the assertion failed. Retry; a fresh assertion is built on every attempt.',
  'transport': 'The token endpoint could not be reached. Check connectivity and retry.',
  'response-parse': 'The token endpoint returned an unreadable response. Contact the platform operator.',
  'exchange': 'The token endpoint rejected the request. Check that the service account is enabled and its key is registered, or contact the platform operator.'
};

export abstract class TokenRequestError extends Error {
  abstract readonly kind: TokenErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get remediation(): string {
    return REMEDIATION[this.kind];
  }
}

/**
 * Missing or invalid request configuration, detected before any key or network work
 */
export class ConfigError extends TokenRequestError {
  readonly kind = 'config';

  constructor(readonly field: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Malformed or incomplete key description. Only the field name is ever reported.
 */
export class KeyMaterialError extends TokenRequestError {
  readonly kind = 'key-material';

  constructor(readonly field: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AssertionError extends TokenRequestError {
  readonly kind = 'assertion';
}

/**
 * Connection, TLS or timeout failure talking to the token endpoint
 */
export class TransportError extends TokenRequestError {
  readonly kind = 'transport';

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The endpoint answered 200 but the body is not a usable token response
 */
export class ResponseParseError extends TokenRequestError {
  readonly kind = 'response-parse';

  constructor(readonly url: string, readonly status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Non-200 answer from the token endpoint. `body` is the raw response text and
 * is not guaranteed to be JSON.
 */
export class ExchangeError extends TokenRequestError {
  readonly kind = 'exchange';

  constructor(readonly url: string, readonly status: number, readonly body: string) {
    super(`Token request to ${url} failed with status ${status}: ${body}`);
  }
}

export function isTokenRequestError(error: unknown): error is TokenRequestError {
  return error instanceof TokenRequestError;
}
