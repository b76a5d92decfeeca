/**
 * RSA private key in JSON Web Key form (RFC 7518 §6.3). Numeric members are
 * unpadded base64url strings.
 */
export interface RsaKeyDescription {
  kty: 'RSA';
  n: string;
  e?: string;
  d: string;
  p: string;
  q: string;
  dp?: string;
  dq?: string;
  qi?: string;
  kid?: string;
  use?: string;
}

// Tagged on `kty`; new key types join this union.
export type KeyDescription = RsaKeyDescription;

export interface AssertionClaims {
  iss: string;
  sub: string;
  aud: string;
  exp: number;
  jti: string;
}

export interface SignedAssertion {
  token: string;
  claims: AssertionClaims;
}

export interface TokenResultMetadata {
  service_account_id?: string;
  generated_at?: number;
  platform?: string;
  token_endpoint?: string;
  [key: string]: string | number | undefined;
}

export interface TokenResult {
  readonly accessToken: string;
  readonly tokenType: string;
  readonly expiresInSeconds: number;
  readonly expiresAt: Date;
  readonly scope?: string;
  readonly metadata: Readonly<TokenResultMetadata>;
}

/**
 * Normalized input to the token pipeline
 */
export interface RequestConfig {
  serviceAccountId: string;
  tokenEndpointBase: string;
  scope: string;
  jwkSource: KeyDescription;
  lifetimeSeconds: number;
  platform?: string;
}

export type TokenType = 'service-account' | 'user' | 'custom';

export type OutputFormat = 'text' | 'json' | 'yaml';

/**
 * Token configuration as written in a YAML file. Several fields have an
 * alternate spelling kept for compatibility with existing files.
 */
export interface TokenConfigFile {
  type?: string;
  baseUrl?: string;
  platform?: string;
  service_account_id?: string;
  jwk_json?: string;
  jwk?: Record<string, unknown>;
  privateKey?: string;
  scope?: string;
  scopes?: string[];
  exp_seconds?: number;
  expiresIn?: string | number;
  verbose?: boolean;
  output_format?: string;
}
