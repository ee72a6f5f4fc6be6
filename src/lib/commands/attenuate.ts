import { resolveDatalog, resolveToken } from '../input/resolve.js';
import type { DatalogSource, TokenSource } from '../input/sources.js';
import { delegate, type CommandDefinition } from '../pipeline.js';
import { buildBlock, decodeToken, newBlock, payloadOutput, type BlockSettings } from './shared.js';

export interface AttenuateOptions extends BlockSettings {
  token: TokenSource;
  block: DatalogSource;
  raw: boolean;
}

interface Resolved {
  token: Uint8Array;
  block: string;
}

/**
 * Append a block to a token
 */
export function attenuateCommand(options: AttenuateOptions): CommandDefinition<Resolved, Uint8Array> {
  return {
    name: 'attenuate',
    sources: [
      { label: 'the token', source: options.token },
      { label: 'the block', source: options.block },
    ],
    resolve: (io) => ({
      token: resolveToken(options.token, io),
      block: resolveDatalog(options.block, io, 'the block'),
    }),
    execute: (resolved, context) => {
      const { log } = context;
      const token = decodeToken(log, resolved.token);
      const builder = buildBlock(log, newBlock, resolved.block, options, context.now());
      return delegate(log, 'append block', () => token.append(builder)).toBytes();
    },
    emit: payloadOutput(options.raw),
  };
}
