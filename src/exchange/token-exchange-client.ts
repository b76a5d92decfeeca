import fetch from 'node-fetch';
import { ResponseParseError, TransportError, ExchangeError } from '../errors';
import { Logger, silentLogger } from '../logger';
import { TokenResult } from '../types';
import { USER_AGENT } from '../version';

export const JWT_BEARER_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
export const SERVICE_ACCOUNT_CLIENT_ID = 'service-account';
export const DEFAULT_EXCHANGE_TIMEOUT_MS = 30000;

export interface TokenHttpRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  timeout?: number;
}

export interface TokenHttpResponse {
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: TokenHttpRequestInit) => Promise<TokenHttpResponse>;

export interface TokenExchangeClientOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Wire shape of a successful token endpoint response
 */
export interface TokenEndpointResponse {
  access_token: string;
  token_type: string;
  expires_in?: number | string;
  scope?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseExpiresIn(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
  }
  return 0;
}

/**
 * Exchanges a signed assertion for an access token (RFC 7523 JWT-Bearer grant).
 * One attempt per call, bounded by the timeout; the caller must sign a new
 * assertion before trying again.
 */
export class TokenExchangeClient {
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: TokenExchangeClientOptions = {}) {
    this.fetch = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async exchange(tokenEndpointUrl: string, assertion: string, scope: string): Promise<TokenResult> {
    const form: Record<string, string> = {
      client_id: SERVICE_ACCOUNT_CLIENT_ID,
      grant_type: JWT_BEARER_GRANT_TYPE,
      assertion
    };
    if (scope) {
      form.scope = scope;
    }

    this.logger.log(`🌐 Requesting access token from ${tokenEndpointUrl}`);
    this.logger.log(`🔑 Grant type: ${JWT_BEARER_GRANT_TYPE}`);
    this.logger.log(`🎯 Scope: ${scope || '(none)'}`);

    const { status, body } = await this.send(tokenEndpointUrl, new URLSearchParams(form).toString());

    this.logger.log(`📡 Response status: ${status}`);

    if (status !== 200) {
      this.logger.error(`❌ Token request rejected: ${status} ${body}`);
      throw new ExchangeError(tokenEndpointUrl, status, body);
    }

    const tokenResponse = this.parseTokenResponse(tokenEndpointUrl, status, body);
    const expiresInSeconds = parseExpiresIn(tokenResponse.expires_in);

    this.logger.log(`✅ Access token received (length: ${tokenResponse.access_token.length} chars)`);
    this.logger.log(`⏱️  Expires in: ${expiresInSeconds} seconds`);

    return Object.freeze({
      accessToken: tokenResponse.access_token,
      tokenType: tokenResponse.token_type,
      expiresInSeconds,
      expiresAt: new Date(this.now() + expiresInSeconds * 1000),
      scope: tokenResponse.scope,
      metadata: Object.freeze({ token_endpoint: tokenEndpointUrl })
    });
  }

  private async send(url: string, body: string): Promise<{ status: number; body: string }> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransportError(url, `Token request to ${url} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    const request = (async () => {
      const response = await this.fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
          'User-Agent': USER_AGENT
        },
        body,
        timeout: this.timeoutMs
      });
      return { status: response.status, body: await response.text() };
    })();

    try {
      return await Promise.race([request, timeout]);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(url, `Token request to ${url} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private parseTokenResponse(url: string, status: number, body: string): TokenEndpointResponse {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ResponseParseError(url, status, `Token response from ${url} is not valid JSON`, { cause: error });
    }

    if (!isRecord(payload)) {
      throw new ResponseParseError(url, status, `Token response from ${url} is not a JSON object`);
    }
    if (typeof payload.access_token !== 'string' || payload.access_token === '') {
      throw new ResponseParseError(url, status, `Token response from ${url} has no access_token`);
    }
    if (typeof payload.token_type !== 'string') {
      throw new ResponseParseError(url, status, `Token response from ${url} has no token_type`);
    }

    const expiresIn = payload.expires_in;
    return {
      access_token: payload.access_token,
      token_type: payload.token_type,
      expires_in: typeof expiresIn === 'number' || typeof expiresIn === 'string' ? expiresIn : undefined,
      scope: typeof payload.scope === 'string' ? payload.scope : undefined
    };
  }
}
