/**
 * Where each input of a command comes from and how it is encoded.
 *
 * The builders turn commander option records into exactly one variant per
 * input. Combinations commander already rejects through `conflicts` are
 * internal errors; the ones it cannot express (an option that requires
 * another, one of two options being required) are usage errors.
 */

import { InternalError, UsageError } from '../errors.js';
import type { Algorithm } from '../keys.js';

/** Path that stands for standard input */
export const STDIN_PATH = '-';

export const KEY_FORMATS = ['hex', 'pem', 'raw'] as const;
export type KeyFormat = (typeof KEY_FORMATS)[number];

export type KeySource =
  | { type: 'hex'; text: string }
  | { type: 'pem'; text: string }
  | { type: 'file'; format: KeyFormat; path: string; algorithm?: Algorithm }
  | { type: 'stdin'; format: KeyFormat; algorithm?: Algorithm };

export type TokenEncoding = 'base64' | 'raw';

/** Tokens, third-party requests, third-party blocks and snapshots */
export type TokenSource =
  | { type: 'stdin'; encoding: TokenEncoding }
  | { type: 'file'; encoding: TokenEncoding; path: string }
  | { type: 'literal'; text: string };

export type DatalogSource =
  | { type: 'file'; path: string }
  | { type: 'stdin' }
  | { type: 'literal'; text: string }
  | { type: 'editor' };

export type AuthorizerSource =
  | { type: 'datalog'; source: DatalogSource }
  | { type: 'snapshot'; source: TokenSource };

export type Source = KeySource | TokenSource | DatalogSource;

export interface KeyOptions {
  /** key given on the command line */
  key?: string;
  file?: string;
  format: KeyFormat;
  algorithm?: Algorithm;
}

/**
 * Optional key input, as used by `keypair` and `inspect`
 */
export function keySource({ key, file, format, algorithm }: KeyOptions): KeySource | undefined {
  if (key !== undefined && file !== undefined) {
    throw new InternalError('a key literal and a key file were both given');
  }
  if (algorithm !== undefined && file === undefined) {
    throw new UsageError('a key algorithm can only be given for a key read from a file or stdin');
  }

  if (key !== undefined) {
    switch (format) {
      case 'raw':
        throw new UsageError('raw key input is only allowed from a file or stdin');
      case 'hex':
        return { type: 'hex', text: key };
      case 'pem':
        return { type: 'pem', text: key };
    }
  }
  if (file === STDIN_PATH) {
    return { type: 'stdin', format, ...(algorithm ? { algorithm } : {}) };
  }
  if (file !== undefined) {
    return { type: 'file', format, path: file, ...(algorithm ? { algorithm } : {}) };
  }
  return undefined;
}

/**
 * Signing key input: exactly one of `--private-key` and `--private-key-file`
 */
export function privateKeySource(options: KeyOptions): KeySource {
  const source = keySource(options);
  if (!source) {
    throw new UsageError('one of --private-key or --private-key-file is required');
  }
  return source;
}

export function tokenSource(path: string, raw: boolean): TokenSource {
  const encoding: TokenEncoding = raw ? 'raw' : 'base64';
  return path === STDIN_PATH ? { type: 'stdin', encoding } : { type: 'file', encoding, path };
}

/**
 * Authority block of `generate`: a file, stdin or the editor
 */
export function authoritySource(file?: string): DatalogSource {
  if (file === undefined) return { type: 'editor' };
  return file === STDIN_PATH ? { type: 'stdin' } : { type: 'file', path: file };
}

export interface BlockOptions {
  block?: string;
  blockFile?: string;
}

/**
 * New block of `attenuate` and `generate-third-party-block`
 */
export function blockSource({ block, blockFile }: BlockOptions): DatalogSource {
  if (block !== undefined && blockFile !== undefined) {
    throw new InternalError('--block and --block-file were both given');
  }
  if (block !== undefined) return { type: 'literal', text: block };
  return authoritySource(blockFile);
}

export interface BlockContentsOptions {
  blockContents?: string;
  blockContentsFile?: string;
  rawBlockContents: boolean;
}

/**
 * Third-party block given to `append-third-party-block`
 */
export function blockContentsSource({ blockContents, blockContentsFile, rawBlockContents }: BlockContentsOptions): TokenSource {
  if (blockContents !== undefined && blockContentsFile !== undefined) {
    throw new InternalError('--block-contents and --block-contents-file were both given');
  }
  if (blockContents !== undefined) {
    if (rawBlockContents) {
      throw new UsageError('--raw-block-contents requires --block-contents-file');
    }
    return { type: 'literal', text: blockContents };
  }
  if (blockContentsFile === undefined) {
    throw new UsageError('one of --block-contents or --block-contents-file is required');
  }
  return tokenSource(blockContentsFile, rawBlockContents);
}

export interface AuthorizerOptions {
  authorizeWith?: string;
  authorizeWithFile?: string;
  authorizeInteractive: boolean;
  authorizeWithSnapshot?: string;
  authorizeWithSnapshotFile?: string;
  authorizeWithRawSnapshotFile: boolean;
}

/**
 * Optional authorizer of `inspect`
 */
export function authorizerSource(options: AuthorizerOptions): AuthorizerSource | undefined {
  const given = [
    options.authorizeWith,
    options.authorizeWithFile,
    options.authorizeInteractive || undefined,
    options.authorizeWithSnapshot,
    options.authorizeWithSnapshotFile,
  ].filter((value) => value !== undefined);
  if (given.length > 1) {
    throw new InternalError('several authorizer inputs were given');
  }
  if (options.authorizeWithRawSnapshotFile && options.authorizeWithSnapshotFile === undefined) {
    throw new UsageError('--authorize-with-raw-snapshot-file requires --authorize-with-snapshot-file');
  }

  if (options.authorizeWith !== undefined) {
    return { type: 'datalog', source: { type: 'literal', text: options.authorizeWith } };
  }
  if (options.authorizeWithFile !== undefined) {
    return { type: 'datalog', source: authoritySource(options.authorizeWithFile) };
  }
  if (options.authorizeInteractive) {
    return { type: 'datalog', source: { type: 'editor' } };
  }
  if (options.authorizeWithSnapshot !== undefined) {
    return { type: 'snapshot', source: { type: 'literal', text: options.authorizeWithSnapshot } };
  }
  if (options.authorizeWithSnapshotFile !== undefined) {
    return { type: 'snapshot', source: tokenSource(options.authorizeWithSnapshotFile, options.authorizeWithRawSnapshotFile) };
  }
  return undefined;
}
