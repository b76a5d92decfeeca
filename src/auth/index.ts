export { TokenProvider } from './token-provider';
export { ServiceAccountTokenProvider, ServiceAccountProviderOptions, TokenRequestState } from './service-account-provider';
