/**
 * Byte encodings shared by keys, tokens and the command line: hex, base64 and
 * PEM armour
 */

import { base64pad, base64url } from 'multiformats/bases/base64';

export const textEncoder = new TextEncoder();

/**
 * Encode bytes as a lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Decode a hex string to bytes. A leading `0x` and whitespace are ignored.
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.replace(/^0x/, '').replace(/\s/g, '');

  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd number of characters');
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    const pair = cleanHex.slice(i, i + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new Error(`Invalid hex character at position ${i}`);
    }
    bytes[i / 2] = parseInt(pair, 16);
  }

  return bytes;
}

/**
 * URL-safe base64 without padding, the text form of tokens, requests,
 * third-party blocks and snapshots
 */
export function toBase64(bytes: Uint8Array): string {
  return base64url.baseEncode(bytes);
}

/**
 * Decode base64 text. Surrounding whitespace, padding and the standard
 * alphabet are accepted.
 */
export function fromBase64(text: string): Uint8Array {
  const normalized = text.trim().replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
  if (normalized.length === 0) {
    throw new Error('empty input');
  }
  return base64url.baseDecode(normalized);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * Wrap DER bytes in a PEM envelope with 64 character lines
 */
export function pemEncode(label: string, der: Uint8Array): string {
  const body = base64pad.baseEncode(der).match(/.{1,64}/g) ?? [];
  return [`-----BEGIN ${label}-----`, ...body, `-----END ${label}-----`, ''].join('\n');
}

/**
 * Decode UTF-8, throwing on invalid sequences instead of substituting U+FFFD
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}
