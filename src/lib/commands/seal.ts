import { resolveToken } from '../input/resolve.js';
import type { TokenSource } from '../input/sources.js';
import { delegate, type CommandDefinition } from '../pipeline.js';
import { decodeToken, payloadOutput } from './shared.js';

export interface SealOptions {
  token: TokenSource;
  raw: boolean;
}

/**
 * Seal a token so that no block can be appended anymore
 */
export function sealCommand(options: SealOptions): CommandDefinition<Uint8Array, Uint8Array> {
  return {
    name: 'seal',
    sources: [{ label: 'the token', source: options.token }],
    resolve: (io) => resolveToken(options.token, io),
    execute: (bytes, { log }) => delegate(log, 'seal token', () => decodeToken(log, bytes).seal()).toBytes(),
    emit: payloadOutput(options.raw),
  };
}
