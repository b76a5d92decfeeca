import { TokenProvider } from './token-provider';
import { AssertionBuilder, tokenEndpointUrl } from '../assertion';
import { TokenExchangeClient, FetchLike } from '../exchange';
import { decodeKeyDescription } from '../keys';
import { Logger, resolveLogger } from '../logger';
import { RequestConfig, TokenResult } from '../types';

export interface ServiceAccountProviderOptions {
  verbose?: boolean;
  logger?: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
  now?: () => number;
}

export type TokenRequestState =
  | 'START'
  | 'KEY_DECODED'
  | 'ASSERTION_SIGNED'
  | 'REQUEST_SENT'
  | 'SUCCESS'
  | 'FAILED';

/**
 * JWT-Bearer flow for service account authentication
 *
 * Each acquireToken() call decodes its own key, signs its own assertion and
 * makes exactly one request; nothing is shared between calls.
 */
export class ServiceAccountTokenProvider implements TokenProvider {
  private readonly logger: Logger;
  private readonly assertionBuilder: AssertionBuilder;
  private readonly exchangeClient: TokenExchangeClient;
  private readonly now: () => number;

  constructor(private readonly config: RequestConfig, options: ServiceAccountProviderOptions = {}) {
    this.logger = resolveLogger(options);
    this.now = options.now ?? Date.now;
    this.assertionBuilder = new AssertionBuilder({ now: this.now });
    this.exchangeClient = new TokenExchangeClient({
      fetch: options.fetch,
      timeoutMs: options.timeoutMs,
      logger: this.logger,
      now: this.now
    });
  }

  getType(): string {
    return 'service-account';
  }

  getName(): string {
    return this.config.serviceAccountId;
  }

  async acquireToken(): Promise<TokenResult> {
    let state: TokenRequestState = 'START';
    this.logger.log(`🔐 Generating service account token for: ${this.config.serviceAccountId}`);

    try {
      const key = decodeKeyDescription(this.config.jwkSource);
      state = 'KEY_DECODED';
      this.logger.log(`🔑 Key decoded (RSA, ${key.modulusBits} bits)`);

      const endpoint = tokenEndpointUrl(this.config.tokenEndpointBase);
      const assertion = this.assertionBuilder.build({
        serviceAccountId: this.config.serviceAccountId,
        tokenEndpointUrl: endpoint,
        lifetimeSeconds: this.config.lifetimeSeconds,
        key
      });
      state = 'ASSERTION_SIGNED';
      this.logger.log(`✍️  Assertion signed for audience: ${assertion.claims.aud}`);
      this.logger.log(`📅 Assertion expires at: ${new Date(assertion.claims.exp * 1000).toISOString()}`);

      state = 'REQUEST_SENT';
      const result = await this.exchangeClient.exchange(endpoint, assertion.token, this.config.scope);

      state = 'SUCCESS';
      this.logger.log(`✅ Token generated successfully, expires at: ${result.expiresAt.toISOString()}`);

      return Object.freeze({
        ...result,
        metadata: Object.freeze({
          ...result.metadata,
          service_account_id: this.config.serviceAccountId,
          generated_at: Math.floor(this.now() / 1000),
          platform: this.config.platform ?? ''
        })
      });
    } catch (error) {
      const failedAt = state;
      state = 'FAILED';
      this.logger.error(`❌ Service account token request ${state} after ${failedAt}: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
