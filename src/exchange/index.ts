export {
  TokenExchangeClient,
  TokenExchangeClientOptions,
  TokenEndpointResponse,
  TokenHttpRequestInit,
  TokenHttpResponse,
  FetchLike,
  JWT_BEARER_GRANT_TYPE,
  SERVICE_ACCOUNT_CLIENT_ID,
  DEFAULT_EXCHANGE_TIMEOUT_MS
} from './token-exchange-client';
