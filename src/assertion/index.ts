export {
  AssertionBuilder,
  AssertionBuilderOptions,
  AssertionRequest,
  buildAssertion,
  tokenEndpointUrl,
  TOKEN_ENDPOINT_PATH
} from './assertion-builder';
