import { KeyObject, createPrivateKey, createPublicKey } from 'crypto';
import { inspect } from 'util';
import * as jwt from 'jsonwebtoken';
import { AssertionClaims } from '../types';

export interface RsaKeyComponents {
  n: bigint;
  e: bigint;
  d: bigint;
  p: bigint;
  q: bigint;
  dp: bigint;
  dq: bigint;
  qi: bigint;
}

function toBase64Url(value: bigint): string {
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  return Buffer.from(hex, 'hex').toString('base64url');
}

/**
 * RSA private key held as an opaque capability: it signs assertion claims and
 * hands out its public half, nothing else. Serializing or inspecting it shows
 * only the key type and size.
 */
export class PrivateSigningKey {
  readonly algorithm = 'RS256';

  private constructor(
    private readonly keyObject: KeyObject,
    readonly modulusBits: number
  ) {}

  static fromComponents(components: RsaKeyComponents): PrivateSigningKey {
    const keyObject = createPrivateKey({
      format: 'jwk',
      key: {
        kty: 'RSA',
        n: toBase64Url(components.n),
        e: toBase64Url(components.e),
        d: toBase64Url(components.d),
        p: toBase64Url(components.p),
        q: toBase64Url(components.q),
        dp: toBase64Url(components.dp),
        dq: toBase64Url(components.dq),
        qi: toBase64Url(components.qi)
      }
    });
    return new PrivateSigningKey(keyObject, components.n.toString(2).length);
  }

  /**
   * Produce a compact RS256 JWS over the claims. No `iat` is added. Any RSA key
   * that decodes is accepted, whatever its modulus size.
   */
  sign(claims: AssertionClaims): string {
    return jwt.sign({ ...claims }, this.keyObject, {
      algorithm: 'RS256',
      noTimestamp: true,
      allowInsecureKeySizes: true
    });
  }

  publicKey(): KeyObject {
    return createPublicKey(this.keyObject);
  }

  toJSON(): { kty: 'RSA'; modulusBits: number } {
    return { kty: 'RSA', modulusBits: this.modulusBits };
  }

  [inspect.custom](): string {
    return `PrivateSigningKey { kty: 'RSA', modulusBits: ${this.modulusBits} }`;
  }
}
