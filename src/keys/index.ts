export { parseKeyDescription, decodeKeyDescription, RSA_PUBLIC_EXPONENT } from './jwk-decoder';
export { PrivateSigningKey, RsaKeyComponents } from './private-signing-key';
