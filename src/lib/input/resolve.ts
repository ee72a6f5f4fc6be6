/**
 * Resolvers: read each input source and decode it. Every failure is a CliError
 * and happens before any output is written.
 */

import { readFileSync } from 'node:fs';
import { decodeUtf8, fromBase64, hexToBytes } from '../encoding.js';
import { InvalidText, IoFailure, MalformedEncoding } from '../errors.js';
import { PrivateKey, PublicKey, type Algorithm } from '../keys.js';
import type { Editor } from './editor.js';
import type { DatalogSource, KeySource, TokenSource } from './sources.js';
import type { Stdin } from './stdin.js';

export interface InputContext {
  stdin: Stdin;
  editor: Editor;
  readFile(path: string): Uint8Array;
}

export function readFileBytes(path: string): Uint8Array {
  return new Uint8Array(readFileSync(path));
}

type StreamSource = { type: 'file'; path: string } | { type: 'stdin' };

function readBytes(source: StreamSource, io: InputContext): Uint8Array {
  if (source.type === 'stdin') {
    return io.stdin.read();
  }
  try {
    return io.readFile(source.path);
  } catch (error) {
    throw new IoFailure(source.path, error);
  }
}

function readText(source: StreamSource, io: InputContext, label: string): string {
  const bytes = readBytes(source, io);
  try {
    return decodeUtf8(bytes);
  } catch (error) {
    throw new InvalidText(source.type === 'stdin' ? `${label} (from standard input)` : source.path, error);
  }
}

function decodeBase64(text: string, label: string): Uint8Array {
  try {
    return fromBase64(text);
  } catch (error) {
    throw new MalformedEncoding(label, 'base64', error);
  }
}

export type KeyMaterial =
  | { format: 'hex'; text: string; algorithm?: Algorithm }
  | { format: 'pem'; text: string }
  | { format: 'raw'; bytes: Uint8Array; algorithm: Algorithm };

/**
 * Read key material without interpreting it as a key yet
 */
export function resolveKeyMaterial(source: KeySource, io: InputContext, label: string): KeyMaterial {
  switch (source.type) {
    case 'hex':
      return { format: 'hex', text: source.text.trim() };
    case 'pem':
      return { format: 'pem', text: source.text };
    case 'file':
    case 'stdin': {
      if (source.format === 'raw') {
        return { format: 'raw', bytes: readBytes(source, io), algorithm: source.algorithm ?? 'ed25519' };
      }
      const text = readText(source, io, label);
      return source.format === 'hex'
        ? { format: 'hex', text: text.trim(), ...(source.algorithm ? { algorithm: source.algorithm } : {}) }
        : { format: 'pem', text };
    }
  }
}

/**
 * Build a key, reporting any failure as a malformed encoding of `label`
 */
function decodeKey<K>(material: KeyMaterial, label: string, decode: {
  fromString(text: string): K;
  fromBytes(bytes: Uint8Array, algorithm: Algorithm): K;
  fromPem(pem: string): K;
}): K {
  try {
    switch (material.format) {
      case 'hex':
        return material.text.includes('/')
          ? decode.fromString(material.text)
          : decode.fromBytes(hexToBytes(material.text), material.algorithm ?? 'ed25519');
      case 'pem':
        return decode.fromPem(material.text);
      case 'raw':
        return decode.fromBytes(material.bytes, material.algorithm);
    }
  } catch (error) {
    throw new MalformedEncoding(label, material.format, error);
  }
}

export function resolvePrivateKey(source: KeySource, io: InputContext, label = 'private key'): PrivateKey {
  return decodeKey(resolveKeyMaterial(source, io, label), label, PrivateKey);
}

export function resolvePublicKey(source: KeySource, io: InputContext, label = 'public key'): PublicKey {
  return decodeKey(resolveKeyMaterial(source, io, label), label, PublicKey);
}

/**
 * Bytes of a token, request, third-party block or snapshot
 */
export function resolveToken(source: TokenSource, io: InputContext, label = 'token'): Uint8Array {
  if (source.type === 'literal') {
    return decodeBase64(source.text, label);
  }
  const bytes = readBytes(source, io);
  if (source.encoding === 'raw') {
    return bytes;
  }
  let text: string;
  try {
    text = decodeUtf8(bytes);
  } catch (error) {
    throw new MalformedEncoding(label, 'base64', error);
  }
  return decodeBase64(text, label);
}

export function resolveDatalog(source: DatalogSource, io: InputContext, label = 'the block'): string {
  switch (source.type) {
    case 'literal':
      return source.text;
    case 'editor':
      return io.editor.edit(label);
    case 'file':
    case 'stdin':
      return readText(source, io, label);
  }
}
