export {
  TokenConfigLoader,
  normalizeTokenConfig,
  resolveBaseUrl,
  resolveLifetimeSeconds,
  resolveScope,
  parseDurationSeconds,
  DEFAULT_LIFETIME_SECONDS
} from './token-config';
