/**
 * Key material for signing and verifying biscuits
 *
 * Ed25519 keys go through @noble/ed25519. secp256r1 (P-256) keys use ECDSA
 * with SHA-256 from node:crypto, with 64-byte IEEE P1363 signatures and
 * 33-byte compressed public keys.
 */

import * as ed25519 from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha512';
import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign as nodeSign,
  verify as nodeVerify,
  type KeyObject,
} from 'node:crypto';
import { bytesEqual, bytesToHex, concatBytes, fromBase64, hexToBytes, pemEncode } from './encoding.js';
import { KeyError, errorMessage } from './errors.js';

// Configure ed25519 to use sha512
ed25519.etc.sha512Sync = (...msgs) => {
  const h = sha512.create();
  for (const msg of msgs) h.update(msg);
  return h.digest();
};

export const ALGORITHMS = ['ed25519', 'secp256r1'] as const;
export type Algorithm = (typeof ALGORITHMS)[number];

// DER prefixes for PKCS#8 private keys and SPKI public keys
const ED25519_PKCS8_PREFIX = hexToBytes('302e020100300506032b657004220420');
const ED25519_SPKI_PREFIX = hexToBytes('302a300506032b6570032100');
const P256_PKCS8_PREFIX = hexToBytes(
  '308141020100301306072a8648ce3d020106082a8648ce3d030107042730250201010420'
);
const P256_SPKI_COMPRESSED_PREFIX = hexToBytes(
  '3039301306072a8648ce3d020106082a8648ce3d030107032200'
);

const PRIVATE_KEY_LENGTH = 32;
const PUBLIC_KEY_LENGTH: Record<Algorithm, number> = { ed25519: 32, secp256r1: 33 };

export function isAlgorithm(value: string): value is Algorithm {
  return (ALGORITHMS as readonly string[]).includes(value);
}

function jwkBytes(value: string | undefined, field: string): Uint8Array {
  if (value === undefined) {
    throw new KeyError(`key export is missing the '${field}' component`);
  }
  return fromBase64(value);
}

/**
 * Compress an uncompressed P-256 point given as its x and y coordinates
 */
function compressPoint(x: Uint8Array, y: Uint8Array): Uint8Array {
  const prefix = (y[y.length - 1] & 1) === 1 ? 0x03 : 0x02;
  return concatBytes(new Uint8Array([prefix]), x);
}

function p256PrivateKeyObject(bytes: Uint8Array): KeyObject {
  return createPrivateKey({
    key: Buffer.from(concatBytes(P256_PKCS8_PREFIX, bytes)),
    format: 'der',
    type: 'pkcs8',
  });
}

function p256PublicKeyObject(bytes: Uint8Array): KeyObject {
  return createPublicKey({
    key: Buffer.from(concatBytes(P256_SPKI_COMPRESSED_PREFIX, bytes)),
    format: 'der',
    type: 'spki',
  });
}

/**
 * Split a `<algorithm>[-private]/<hex>` string. Unprefixed hex is ed25519.
 */
function splitPrefixed(text: string, suffix: string): { algorithm: Algorithm; hex: string } {
  const trimmed = text.trim();
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    return { algorithm: 'ed25519', hex: trimmed };
  }

  const prefix = trimmed.slice(0, slash);
  const algorithm = prefix.slice(0, prefix.length - suffix.length);
  if (!prefix.endsWith(suffix) || !isAlgorithm(algorithm)) {
    throw new KeyError(`Unknown key prefix "${prefix}"`);
  }
  return { algorithm, hex: trimmed.slice(slash + 1) };
}

export class PublicKey {
  private constructor(
    readonly algorithm: Algorithm,
    private readonly bytes: Uint8Array,
    private readonly keyObject: KeyObject | null
  ) {}

  static fromBytes(bytes: Uint8Array, algorithm: Algorithm): PublicKey {
    if (bytes.length !== PUBLIC_KEY_LENGTH[algorithm]) {
      throw new KeyError(
        `Invalid ${algorithm} public key length: expected ${PUBLIC_KEY_LENGTH[algorithm]} bytes, got ${bytes.length}`
      );
    }

    if (algorithm === 'ed25519') {
      try {
        ed25519.ExtendedPoint.fromHex(bytes);
      } catch (error) {
        throw new KeyError(`Invalid ed25519 public key: ${errorMessage(error)}`, { cause: error });
      }
      return new PublicKey(algorithm, Uint8Array.from(bytes), null);
    }

    try {
      return new PublicKey(algorithm, Uint8Array.from(bytes), p256PublicKeyObject(bytes));
    } catch (error) {
      throw new KeyError(`Invalid secp256r1 public key: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Parse `ed25519/<hex>` or `secp256r1/<hex>`; unprefixed hex is ed25519
   */
  static fromString(text: string): PublicKey {
    const { algorithm, hex } = splitPrefixed(text, '');
    return PublicKey.fromBytes(hexToBytes(hex), algorithm);
  }

  static fromPem(pem: string): PublicKey {
    let keyObject: KeyObject;
    try {
      keyObject = createPublicKey(pem);
    } catch (error) {
      throw new KeyError(`Invalid PEM public key: ${errorMessage(error)}`, { cause: error });
    }
    return publicKeyFromObject(keyObject);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toString(): string {
    return `${this.algorithm}/${bytesToHex(this.bytes)}`;
  }

  toPem(): string {
    const prefix = this.algorithm === 'ed25519' ? ED25519_SPKI_PREFIX : P256_SPKI_COMPRESSED_PREFIX;
    return pemEncode('PUBLIC KEY', concatBytes(prefix, this.bytes));
  }

  equals(other: PublicKey): boolean {
    return this.algorithm === other.algorithm && bytesEqual(this.bytes, other.bytes);
  }

  verify(message: Uint8Array, signature: Uint8Array): boolean {
    if (this.keyObject === null) {
      try {
        return ed25519.verify(signature, message, this.bytes);
      } catch {
        return false;
      }
    }
    try {
      return nodeVerify('sha256', message, { key: this.keyObject, dsaEncoding: 'ieee-p1363' }, signature);
    } catch {
      return false;
    }
  }
}

function publicKeyFromObject(keyObject: KeyObject): PublicKey {
  const jwk = keyObject.export({ format: 'jwk' });
  if (keyObject.asymmetricKeyType === 'ed25519') {
    return PublicKey.fromBytes(jwkBytes(jwk.x, 'x'), 'ed25519');
  }
  if (keyObject.asymmetricKeyType === 'ec' && jwk.crv === 'P-256') {
    return PublicKey.fromBytes(compressPoint(jwkBytes(jwk.x, 'x'), jwkBytes(jwk.y, 'y')), 'secp256r1');
  }
  throw new KeyError(`Unsupported key type: ${keyObject.asymmetricKeyType ?? 'unknown'}`);
}

export class PrivateKey {
  private constructor(
    readonly algorithm: Algorithm,
    private readonly bytes: Uint8Array,
    private readonly keyObject: KeyObject | null
  ) {}

  static generate(algorithm: Algorithm = 'ed25519'): PrivateKey {
    if (algorithm === 'ed25519') {
      return new PrivateKey(algorithm, ed25519.utils.randomPrivateKey(), null);
    }
    const { privateKey } = generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
    const d = jwkBytes(privateKey.export({ format: 'jwk' }).d, 'd');
    return new PrivateKey(algorithm, d, privateKey);
  }

  static fromBytes(bytes: Uint8Array, algorithm: Algorithm): PrivateKey {
    if (bytes.length !== PRIVATE_KEY_LENGTH) {
      throw new KeyError(
        `Invalid ${algorithm} private key length: expected ${PRIVATE_KEY_LENGTH} bytes, got ${bytes.length}`
      );
    }

    if (algorithm === 'ed25519') {
      return new PrivateKey(algorithm, Uint8Array.from(bytes), null);
    }

    try {
      return new PrivateKey(algorithm, Uint8Array.from(bytes), p256PrivateKeyObject(bytes));
    } catch (error) {
      throw new KeyError(`Invalid secp256r1 private key: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Parse `ed25519-private/<hex>` or `secp256r1-private/<hex>`; unprefixed hex
   * is ed25519
   */
  static fromString(text: string): PrivateKey {
    const { algorithm, hex } = splitPrefixed(text, '-private');
    return PrivateKey.fromBytes(hexToBytes(hex), algorithm);
  }

  static fromPem(pem: string): PrivateKey {
    let keyObject: KeyObject;
    try {
      keyObject = createPrivateKey(pem);
    } catch (error) {
      throw new KeyError(`Invalid PEM private key: ${errorMessage(error)}`, { cause: error });
    }

    const jwk = keyObject.export({ format: 'jwk' });
    if (keyObject.asymmetricKeyType === 'ed25519') {
      return PrivateKey.fromBytes(jwkBytes(jwk.d, 'd'), 'ed25519');
    }
    if (keyObject.asymmetricKeyType === 'ec' && jwk.crv === 'P-256') {
      return PrivateKey.fromBytes(jwkBytes(jwk.d, 'd'), 'secp256r1');
    }
    throw new KeyError(`Unsupported key type: ${keyObject.asymmetricKeyType ?? 'unknown'}`);
  }

  publicKey(): PublicKey {
    if (this.keyObject === null) {
      return PublicKey.fromBytes(ed25519.getPublicKey(this.bytes), 'ed25519');
    }
    return publicKeyFromObject(createPublicKey(this.keyObject));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toString(): string {
    return `${this.algorithm}-private/${bytesToHex(this.bytes)}`;
  }

  toPem(): string {
    const prefix = this.algorithm === 'ed25519' ? ED25519_PKCS8_PREFIX : P256_PKCS8_PREFIX;
    return pemEncode('PRIVATE KEY', concatBytes(prefix, this.bytes));
  }

  sign(message: Uint8Array): Uint8Array {
    if (this.keyObject === null) {
      return ed25519.sign(message, this.bytes);
    }
    return new Uint8Array(
      nodeSign('sha256', message, { key: this.keyObject, dsaEncoding: 'ieee-p1363' })
    );
  }
}

/**
 * A private key with its derived public key
 */
export class KeyPair {
  private constructor(
    readonly privateKey: PrivateKey,
    readonly publicKey: PublicKey
  ) {}

  static generate(algorithm: Algorithm = 'ed25519'): KeyPair {
    return KeyPair.fromPrivateKey(PrivateKey.generate(algorithm));
  }

  static fromPrivateKey(privateKey: PrivateKey): KeyPair {
    return new KeyPair(privateKey, privateKey.publicKey());
  }
}
