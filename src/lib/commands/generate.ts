import { resolveDatalog, resolvePrivateKey } from '../input/resolve.js';
import type { DatalogSource, KeySource } from '../input/sources.js';
import type { PrivateKey } from '../keys.js';
import { delegate, type CommandDefinition } from '../pipeline.js';
import { Biscuit } from '../token/biscuit.js';
import { AuthorityBuilder } from '../token/block.js';
import { buildBlock, payloadOutput, type BlockSettings } from './shared.js';

export interface GenerateOptions extends BlockSettings {
  authority: DatalogSource;
  privateKey: KeySource;
  rootKeyId?: number;
  raw: boolean;
}

interface Resolved {
  source: string;
  privateKey: PrivateKey;
}

/**
 * Sign a new token from an authority block
 */
export function generateCommand(options: GenerateOptions): CommandDefinition<Resolved, Uint8Array> {
  return {
    name: 'generate',
    sources: [
      { label: 'the authority block', source: options.authority },
      { label: 'the private key', source: options.privateKey },
    ],
    resolve: (io) => ({
      source: resolveDatalog(options.authority, io, 'the authority block'),
      privateKey: resolvePrivateKey(options.privateKey, io),
    }),
    execute: ({ source, privateKey }, context) => {
      const { log } = context;
      const builder = buildBlock(log, (text, params) => AuthorityBuilder.fromSource(text, params), source, options, context.now());
      if (options.rootKeyId !== undefined) {
        const id = options.rootKeyId;
        delegate(log, 'set root key id', () => builder.setRootKeyId(id));
      }
      const token = delegate(log, 'sign token', () => Biscuit.build(builder, privateKey));
      return token.toBytes();
    },
    emit: payloadOutput(options.raw),
  };
}
