import { TokenConfigFile, TokenResult } from './types';
import { TokenConfigLoader, normalizeTokenConfig } from './config';
import { TokenProvider, ServiceAccountTokenProvider, ServiceAccountProviderOptions } from './auth';
import { formatTokenResult } from './output/formatter';
import { Logger, resolveLogger } from './logger';

export {
  KeyDescription,
  RsaKeyDescription,
  AssertionClaims,
  SignedAssertion,
  TokenResult,
  TokenResultMetadata,
  RequestConfig,
  TokenConfigFile,
  TokenType,
  OutputFormat
} from './types';
export {
  TokenRequestError,
  TokenErrorKind,
  ConfigError,
  KeyMaterialError,
  AssertionError,
  TransportError,
  ResponseParseError,
  ExchangeError,
  isTokenRequestError
} from './errors';
export { parseKeyDescription, decodeKeyDescription, PrivateSigningKey } from './keys';
export { AssertionBuilder, buildAssertion, tokenEndpointUrl, TOKEN_ENDPOINT_PATH } from './assertion';
export { TokenExchangeClient, TokenExchangeClientOptions, FetchLike, JWT_BEARER_GRANT_TYPE } from './exchange';
export {
  TokenConfigLoader,
  normalizeTokenConfig,
  resolveBaseUrl,
  resolveLifetimeSeconds,
  resolveScope,
  DEFAULT_LIFETIME_SECONDS
} from './config';
export { TokenProvider, ServiceAccountTokenProvider, ServiceAccountProviderOptions } from './auth';
export { formatTokenResult, serializeTokenResult, SerializedTokenResult } from './output/formatter';
export { Logger, consoleLogger, silentLogger } from './logger';
export { VERSION } from './version';

export interface TokenClientOptions extends ServiceAccountProviderOptions {
  outputFormat?: string;
}

/**
 * Entry point for token generation: load a configuration, run the matching
 * provider and render its result.
 */
export class TokenClient {
  private readonly logger: Logger;

  constructor(private readonly config: TokenConfigFile, private readonly options: TokenClientOptions = {}) {
    this.logger = resolveLogger({
      verbose: options.verbose ?? config.verbose,
      logger: options.logger
    });
  }

  static fromFile(configPath: string, options?: TokenClientOptions): TokenClient {
    return new TokenClient(TokenConfigLoader.loadFromFile(configPath), options);
  }

  static fromString(yamlContent: string, options?: TokenClientOptions): TokenClient {
    return new TokenClient(TokenConfigLoader.loadFromString(yamlContent), options);
  }

  /**
   * Build the provider for this configuration. Configuration errors surface
   * here, before any key or network work.
   */
  createProvider(): TokenProvider {
    const request = normalizeTokenConfig(this.config);
    this.logger.log(`⚙️  Loaded service account configuration: ${request.serviceAccountId}`);
    return new ServiceAccountTokenProvider(request, { ...this.options, logger: this.logger });
  }

  async generate(): Promise<TokenResult> {
    return await this.createProvider().acquireToken();
  }

  formatOutput(result: TokenResult): string {
    return formatTokenResult(result, this.options.outputFormat ?? this.config.output_format ?? 'text');
  }
}
