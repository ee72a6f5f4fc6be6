/**
 * The three steps of adding a third-party block: the token holder generates a
 * request, the third party signs a block for it, and the holder appends it.
 */

import { resolveDatalog, resolvePrivateKey, resolveToken } from '../input/resolve.js';
import type { DatalogSource, KeySource, TokenSource } from '../input/sources.js';
import type { PrivateKey } from '../keys.js';
import { delegate, type CommandDefinition } from '../pipeline.js';
import { ThirdPartyBlock, ThirdPartyRequest } from '../token/third-party.js';
import { buildBlock, decodeToken, newBlock, payloadOutput, type BlockSettings } from './shared.js';

export interface RequestOptions {
  token: TokenSource;
  raw: boolean;
}

export function generateRequestCommand(options: RequestOptions): CommandDefinition<Uint8Array, Uint8Array> {
  return {
    name: 'generate-third-party-block-request',
    sources: [{ label: 'the token', source: options.token }],
    resolve: (io) => resolveToken(options.token, io),
    execute: (bytes, { log }) => {
      const token = decodeToken(log, bytes);
      return delegate(log, 'generate request', () => token.thirdPartyRequest().serialize());
    },
    emit: payloadOutput(options.raw),
  };
}

export interface ThirdPartyBlockOptions extends BlockSettings {
  request: TokenSource;
  block: DatalogSource;
  privateKey: KeySource;
  raw: boolean;
}

interface BlockInputs {
  request: Uint8Array;
  block: string;
  privateKey: PrivateKey;
}

export function generateThirdPartyBlockCommand(
  options: ThirdPartyBlockOptions
): CommandDefinition<BlockInputs, Uint8Array> {
  return {
    name: 'generate-third-party-block',
    sources: [
      { label: 'the third-party block request', source: options.request },
      { label: 'the block', source: options.block },
      { label: 'the private key', source: options.privateKey },
    ],
    resolve: (io) => ({
      request: resolveToken(options.request, io, 'third-party block request'),
      block: resolveDatalog(options.block, io, 'the block'),
      privateKey: resolvePrivateKey(options.privateKey, io),
    }),
    execute: (resolved, context) => {
      const { log } = context;
      const request = delegate(log, 'decode request', () => ThirdPartyRequest.fromBytes(resolved.request));
      const builder = buildBlock(log, newBlock, resolved.block, options, context.now());
      return delegate(log, 'sign third-party block', () =>
        request.createBlock(resolved.privateKey, builder).serialize()
      );
    },
    emit: payloadOutput(options.raw),
  };
}

export interface AppendThirdPartyOptions {
  token: TokenSource;
  block: TokenSource;
  raw: boolean;
}

interface AppendInputs {
  token: Uint8Array;
  block: Uint8Array;
}

export function appendThirdPartyBlockCommand(
  options: AppendThirdPartyOptions
): CommandDefinition<AppendInputs, Uint8Array> {
  return {
    name: 'append-third-party-block',
    sources: [
      { label: 'the token', source: options.token },
      { label: 'the third-party block', source: options.block },
    ],
    resolve: (io) => ({
      token: resolveToken(options.token, io),
      block: resolveToken(options.block, io, 'third-party block'),
    }),
    execute: (resolved, { log }) => {
      const token = decodeToken(log, resolved.token);
      const block = delegate(log, 'decode third-party block', () => ThirdPartyBlock.fromBytes(resolved.block));
      return delegate(log, 'append third-party block', () => token.appendThirdParty(block)).toBytes();
    },
    emit: payloadOutput(options.raw),
  };
}
