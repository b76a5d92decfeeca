import { TokenResult } from '../types';

/**
 * Interface for token providers
 * Each provider implements one way of obtaining an access token from the platform
 */
export interface TokenProvider {
  /**
   * Get the token type this provider issues (e.g. "service-account")
   */
  getType(): string;

  /**
   * Get the provider name
   */
  getName(): string;

  /**
   * Acquire a new access token. Nothing is cached between calls.
   */
  acquireToken(): Promise<TokenResult>;
}
