import * as yaml from 'js-yaml';
import * as fs from 'fs';
import { ConfigError } from '../errors';
import { parseKeyDescription } from '../keys';
import { KeyDescription, RequestConfig, TokenConfigFile, TokenType } from '../types';

export const DEFAULT_LIFETIME_SECONDS = 899;

const SUPPORTED_TOKEN_TYPES: TokenType[] = ['service-account', 'user', 'custom'];

const DURATION_UNITS_IN_SECONDS: Record<string, number> = {
  h: 3600,
  m: 60,
  s: 1,
  ms: 1e-3,
  us: 1e-6,
  µs: 1e-6,
  ns: 1e-9
};

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:h|ms|m|s|us|µs|ns))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(h|ms|m|s|us|µs|ns)/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const NANOSECONDS_PER_SECOND = 1e9;

/**
 * Convert a duration such as `15m`, `1h30m` or `900s` to whole seconds.
 * A bare number counts nanoseconds, so it must carry a unit to mean more than
 * a second; `0` is the only unitless string accepted.
 */
export function parseDurationSeconds(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError('expiresIn', `Invalid configuration: "expiresIn" must be a non-negative duration`);
    }
    return Math.floor(value / NANOSECONDS_PER_SECOND);
  }

  const trimmed = value.trim();
  if (trimmed === '0') {
    return 0;
  }
  if (!DURATION_PATTERN.test(trimmed)) {
    throw new ConfigError('expiresIn', `Invalid configuration: "expiresIn" value "${value}" is not a duration (e.g. "15m", "1h30m")`);
  }

  let seconds = 0;
  for (const [, amount, unit] of trimmed.matchAll(DURATION_PART)) {
    seconds += Number(amount) * DURATION_UNITS_IN_SECONDS[unit];
  }
  return Math.floor(seconds);
}

/**
 * `baseUrl` wins over `platform`; both name the same platform base URL.
 */
export function resolveBaseUrl(config: TokenConfigFile): string {
  if (config.baseUrl && config.baseUrl.trim() !== '') {
    return config.baseUrl.trim();
  }
  return config.platform?.trim() ?? '';
}

/**
 * Seconds form first, then the duration form, then the default of 899 seconds.
 */
export function resolveLifetimeSeconds(config: TokenConfigFile): number {
  if (config.exp_seconds !== undefined && config.exp_seconds > 0) {
    return Math.floor(config.exp_seconds);
  }
  if (config.expiresIn !== undefined) {
    const seconds = parseDurationSeconds(config.expiresIn);
    if (seconds > 0) {
      return seconds;
    }
  }
  return DEFAULT_LIFETIME_SECONDS;
}

export function resolveScope(config: TokenConfigFile): string {
  if (config.scope && config.scope.trim() !== '') {
    return config.scope.trim();
  }
  if (config.scopes && config.scopes.length > 0) {
    return config.scopes.join(' ');
  }
  return '';
}

/**
 * Check a raw token configuration and funnel it into the request shape the
 * token pipeline consumes.
 */
export function normalizeTokenConfig(config: TokenConfigFile): RequestConfig {
  const type = config.type ?? 'service-account';
  if (type !== 'service-account') {
    if (SUPPORTED_TOKEN_TYPES.some(supported => supported === type)) {
      throw new ConfigError('type', `Token type "${type}" is not implemented; only "service-account" tokens can be generated`);
    }
    throw new ConfigError('type', `Invalid token type: ${type}`);
  }

  const tokenEndpointBase = resolveBaseUrl(config);
  if (!tokenEndpointBase) {
    throw new ConfigError('baseUrl', 'baseUrl or platform is required');
  }

  const serviceAccountId = config.service_account_id?.trim() ?? '';
  if (!serviceAccountId) {
    throw new ConfigError('service_account_id', 'service_account_id is required for service account tokens');
  }

  const keySources = (['jwk_json', 'jwk', 'privateKey'] as const).filter(field => {
    const value = config[field];
    return typeof value === 'string' ? value.trim() !== '' : value !== undefined;
  });
  if (keySources.length === 0) {
    throw new ConfigError('jwk_json', 'jwk_json is required for service account tokens');
  }
  if (keySources.length > 1) {
    throw new ConfigError(keySources[1], `Only one key source may be configured, found: ${keySources.join(', ')}`);
  }

  let jwkSource: KeyDescription;
  if (config.jwk_json !== undefined && keySources[0] === 'jwk_json') {
    jwkSource = parseKeyDescription(config.jwk_json);
  } else if (config.jwk !== undefined && keySources[0] === 'jwk') {
    jwkSource = parseKeyDescription(config.jwk);
  } else {
    throw new ConfigError('privateKey', 'privateKey is not supported; provide the service account key as jwk_json');
  }

  return {
    serviceAccountId,
    tokenEndpointBase,
    scope: resolveScope(config),
    jwkSource,
    lifetimeSeconds: resolveLifetimeSeconds(config),
    platform: config.platform?.trim() || undefined
  };
}

export class TokenConfigLoader {
  static loadFromFile(configPath: string): TokenConfigFile {
    if (!configPath) {
      throw new ConfigError('config', 'config path is required');
    }

    let content: string;
    try {
      content = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError('config', `Failed to read token configuration from ${configPath}: ${reason}`, { cause: error });
    }

    try {
      return this.parse(content);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.field, `Failed to load token configuration from ${configPath}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  static loadFromString(yamlContent: string): TokenConfigFile {
    try {
      return this.parse(yamlContent);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.field, `Failed to parse token configuration: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private static parse(content: string): TokenConfigFile {
    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError('config', `Invalid YAML: ${reason}`, { cause: error });
    }

    // Empty file
    if (document === undefined || document === null) {
      return {};
    }
    if (!isRecord(document)) {
      throw new ConfigError('config', 'Invalid configuration: document must be a mapping');
    }

    return this.validate(document);
  }

  private static validate(raw: Record<string, unknown>): TokenConfigFile {
    const config: TokenConfigFile = {};

    for (const field of ['type', 'baseUrl', 'platform', 'service_account_id', 'jwk_json', 'privateKey', 'scope', 'output_format'] as const) {
      const value = raw[field];
      if (value === undefined || value === null) {
        continue;
      }
      if (typeof value !== 'string') {
        throw new ConfigError(field, `Invalid configuration: "${field}" must be a string`);
      }
      config[field] = value;
    }

    if (raw.jwk !== undefined && raw.jwk !== null) {
      if (!isRecord(raw.jwk)) {
        throw new ConfigError('jwk', 'Invalid configuration: "jwk" must be a mapping');
      }
      config.jwk = raw.jwk;
    }

    if (raw.scopes !== undefined && raw.scopes !== null) {
      const scopes = raw.scopes;
      if (!Array.isArray(scopes) || !scopes.every((scope): scope is string => typeof scope === 'string')) {
        throw new ConfigError('scopes', 'Invalid configuration: "scopes" must be an array of strings');
      }
      config.scopes = scopes;
    }

    if (raw.exp_seconds !== undefined && raw.exp_seconds !== null) {
      if (typeof raw.exp_seconds !== 'number' || !Number.isInteger(raw.exp_seconds) || raw.exp_seconds < 0) {
        throw new ConfigError('exp_seconds', 'Invalid configuration: "exp_seconds" must be a non-negative integer');
      }
      config.exp_seconds = raw.exp_seconds;
    }

    if (raw.expiresIn !== undefined && raw.expiresIn !== null) {
      if (typeof raw.expiresIn !== 'string' && typeof raw.expiresIn !== 'number') {
        throw new ConfigError('expiresIn', 'Invalid configuration: "expiresIn" must be a duration string or a number of nanoseconds');
      }
      // Surface malformed durations at load time
      parseDurationSeconds(raw.expiresIn);
      config.expiresIn = raw.expiresIn;
    }

    if (raw.verbose !== undefined && raw.verbose !== null) {
      if (typeof raw.verbose !== 'boolean') {
        throw new ConfigError('verbose', 'Invalid configuration: "verbose" must be a boolean');
      }
      config.verbose = raw.verbose;
    }

    return config;
  }
}
