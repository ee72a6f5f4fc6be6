/**
 * Serialized forms of tokens, third-party requests and third-party blocks.
 *
 * Every structure is canonical JSON (RFC 8785) encoded as UTF-8; embedded
 * byte strings are URL-safe base64.
 */

import canonicalize from 'canonicalize';
import { decodeUtf8, fromBase64, textEncoder } from '../encoding.js';
import { TokenError, errorMessage } from '../errors.js';

export const FORMAT_VERSION = 1;

/**
 * Signed contents of a block. `code` is printed Datalog with every parameter
 * already bound.
 */
export interface BlockPayload {
  version: number;
  code: string;
  context?: string;
}

export interface ExternalSignatureWire {
  publicKey: string;
  signature: string;
}

export interface SignedBlockWire {
  payload: string;
  nextKey: string;
  signature: string;
  external?: ExternalSignatureWire;
}

export type ProofWire = { nextSecret: string } | { finalSignature: string };

export interface TokenWire {
  version: number;
  rootKeyId?: number;
  blocks: SignedBlockWire[];
  proof: ProofWire;
}

export interface ThirdPartyRequestWire {
  version: number;
  previousSignature: string;
}

export interface ThirdPartyBlockWire {
  version: number;
  payload: string;
  external: ExternalSignatureWire;
}

/**
 * Canonical JSON bytes of a value
 */
export function canonicalBytes(value: unknown): Uint8Array {
  const json = canonicalize(value);
  if (!json) {
    throw new TokenError('Canonicalization failed');
  }
  return textEncoder.encode(json);
}

export type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(object: JsonObject, field: string, what: string): string {
  const value = object[field];
  if (typeof value !== 'string') {
    throw new TokenError(`Invalid ${what}: missing field '${field}'`);
  }
  return value;
}

function requireVersion(object: JsonObject, what: string): number {
  const version = object.version;
  if (version !== FORMAT_VERSION) {
    throw new TokenError(`Unsupported ${what} version: ${String(version)}`);
  }
  return FORMAT_VERSION;
}

/**
 * Parse UTF-8 JSON that must hold an object
 */
export function parseJsonObject(bytes: Uint8Array, what: string): JsonObject {
  let value: unknown;
  try {
    value = JSON.parse(decodeUtf8(bytes));
  } catch (error) {
    throw new TokenError(`Could not deserialize ${what}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isObject(value)) {
    throw new TokenError(`Could not deserialize ${what}: expected an object`);
  }
  return value;
}

/**
 * Decode base64 embedded in a structure, reporting which field was wrong
 */
export function decodeField(value: string, what: string): Uint8Array {
  try {
    return fromBase64(value);
  } catch (error) {
    throw new TokenError(`Invalid base64 in ${what}: ${errorMessage(error)}`, { cause: error });
  }
}

function parseExternal(value: unknown, what: string): ExternalSignatureWire {
  if (!isObject(value)) {
    throw new TokenError(`Invalid ${what}: malformed external signature`);
  }
  return {
    publicKey: requireString(value, 'publicKey', what),
    signature: requireString(value, 'signature', what),
  };
}

export function parseBlockPayload(bytes: Uint8Array): BlockPayload {
  const object = parseJsonObject(bytes, 'block');
  const context = object.context;
  if (context !== undefined && typeof context !== 'string') {
    throw new TokenError("Invalid block: 'context' must be a string");
  }
  return {
    version: requireVersion(object, 'block'),
    code: requireString(object, 'code', 'block'),
    ...(context !== undefined ? { context } : {}),
  };
}

export function parseTokenWire(bytes: Uint8Array): TokenWire {
  const object = parseJsonObject(bytes, 'token');
  const version = requireVersion(object, 'token');

  const rootKeyId = object.rootKeyId;
  if (rootKeyId !== undefined && (typeof rootKeyId !== 'number' || !Number.isInteger(rootKeyId))) {
    throw new TokenError("Invalid token: 'rootKeyId' must be an integer");
  }

  if (!Array.isArray(object.blocks) || object.blocks.length === 0) {
    throw new TokenError('Invalid token: missing authority block');
  }
  const blocks = object.blocks.map((block: unknown, index: number): SignedBlockWire => {
    const what = `block ${index}`;
    if (!isObject(block)) {
      throw new TokenError(`Invalid token: ${what} is not an object`);
    }
    return {
      payload: requireString(block, 'payload', what),
      nextKey: requireString(block, 'nextKey', what),
      signature: requireString(block, 'signature', what),
      ...(block.external !== undefined ? { external: parseExternal(block.external, what) } : {}),
    };
  });

  const proof = object.proof;
  if (!isObject(proof)) {
    throw new TokenError('Invalid token: missing proof');
  }
  const parsedProof: ProofWire =
    typeof proof.finalSignature === 'string'
      ? { finalSignature: proof.finalSignature }
      : { nextSecret: requireString(proof, 'nextSecret', 'proof') };

  return {
    version,
    ...(rootKeyId !== undefined ? { rootKeyId } : {}),
    blocks,
    proof: parsedProof,
  };
}

export function parseThirdPartyRequestWire(bytes: Uint8Array): ThirdPartyRequestWire {
  const object = parseJsonObject(bytes, 'third-party block request');
  return {
    version: requireVersion(object, 'third-party block request'),
    previousSignature: requireString(object, 'previousSignature', 'third-party block request'),
  };
}

export function parseThirdPartyBlockWire(bytes: Uint8Array): ThirdPartyBlockWire {
  const object = parseJsonObject(bytes, 'third-party block');
  return {
    version: requireVersion(object, 'third-party block'),
    payload: requireString(object, 'payload', 'third-party block'),
    external: parseExternal(object.external, 'third-party block'),
  };
}
