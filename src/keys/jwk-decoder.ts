import { KeyMaterialError } from '../errors';
import { KeyDescription, RsaKeyDescription } from '../types';
import { PrivateSigningKey } from './private-signing-key';

// 65537, "AQAB". The description's own `e` is not read.
export const RSA_PUBLIC_EXPONENT = 65537n;

const REQUIRED_RSA_FIELDS = ['n', 'd', 'p', 'q'] as const;
type RequiredRsaField = typeof REQUIRED_RSA_FIELDS[number];

const FIELD_LABELS: Record<RequiredRsaField, string> = {
  n: 'modulus',
  d: 'private exponent',
  p: 'first prime factor',
  q: 'second prime factor'
};

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn JWK text (or an already parsed object) into a KeyDescription. Only the
 * key type is checked here; numeric members are checked by decodeKeyDescription.
 */
export function parseKeyDescription(source: string | Record<string, unknown>): KeyDescription {
  let parsed: unknown = source;
  if (typeof source === 'string') {
    try {
      parsed = JSON.parse(source);
    } catch (error) {
      throw new KeyMaterialError('jwk', 'Key description is not valid JSON', { cause: error });
    }
  }

  if (!isRecord(parsed)) {
    throw new KeyMaterialError('jwk', 'Key description must be a JSON object');
  }

  if (parsed.kty !== 'RSA') {
    const kty = typeof parsed.kty === 'string' ? `"${parsed.kty}"` : 'missing';
    throw new KeyMaterialError('kty', `Unsupported key type ${kty}: only RSA keys are supported`);
  }

  const description: RsaKeyDescription = { kty: 'RSA', n: '', d: '', p: '', q: '' };
  for (const field of REQUIRED_RSA_FIELDS) {
    const value = parsed[field];
    if (typeof value !== 'string' || value.length === 0) {
      throw new KeyMaterialError(field, `Key description is missing the ${FIELD_LABELS[field]} ("${field}")`);
    }
    description[field] = value;
  }

  for (const field of ['e', 'dp', 'dq', 'qi', 'kid', 'use'] as const) {
    const value = parsed[field];
    if (typeof value === 'string') {
      description[field] = value;
    }
  }

  return description;
}

function decodeUnsigned(description: RsaKeyDescription, field: RequiredRsaField): bigint {
  const encoded = description[field];
  if (typeof encoded !== 'string' || encoded.length === 0) {
    throw new KeyMaterialError(field, `Key description is missing the ${FIELD_LABELS[field]} ("${field}")`);
  }
  // Unpadded base64url never leaves a single trailing character
  if (!BASE64URL_PATTERN.test(encoded) || encoded.length % 4 === 1) {
    throw new KeyMaterialError(field, `The ${FIELD_LABELS[field]} ("${field}") is not valid unpadded base64url`);
  }

  const value = BigInt(`0x${Buffer.from(encoded, 'base64url').toString('hex')}`);
  if (value === 0n) {
    throw new KeyMaterialError(field, `The ${FIELD_LABELS[field]} ("${field}") decodes to zero`);
  }
  return value;
}

function modInverse(value: bigint, modulus: bigint): bigint | null {
  let [oldR, r] = [value % modulus, modulus];
  let [oldS, s] = [1n, 0n];
  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }
  if (oldR !== 1n) {
    return null;
  }
  return ((oldS % modulus) + modulus) % modulus;
}

/**
 * Rebuild the RSA private key from its description. CRT parameters are derived
 * from d, p and q here, so the resulting key is read-only from then on.
 */
export function decodeKeyDescription(description: KeyDescription): PrivateSigningKey {
  if (description.kty !== 'RSA') {
    throw new KeyMaterialError('kty', 'Unsupported key type: only RSA keys are supported');
  }

  const n = decodeUnsigned(description, 'n');
  const d = decodeUnsigned(description, 'd');
  const p = decodeUnsigned(description, 'p');
  const q = decodeUnsigned(description, 'q');

  if (p * q !== n) {
    throw new KeyMaterialError('n', 'The modulus ("n") is not the product of the prime factors ("p", "q")');
  }
  if (p === 1n || q === 1n) {
    throw new KeyMaterialError(p === 1n ? 'p' : 'q', 'Prime factors must be greater than one');
  }

  const qi = modInverse(q, p);
  if (qi === null) {
    throw new KeyMaterialError('q', 'The second prime factor ("q") has no inverse modulo the first ("p")');
  }

  try {
    return PrivateSigningKey.fromComponents({
      n,
      e: RSA_PUBLIC_EXPONENT,
      d,
      p,
      q,
      dp: d % (p - 1n),
      dq: d % (q - 1n),
      qi
    });
  } catch (error) {
    throw new KeyMaterialError('jwk', 'Key description does not form a usable RSA private key', { cause: error });
  }
}
