/**
 * Steps shared by the token commands
 */

import type { Param } from '../datalog/params.js';
import type { Logger } from '../log.js';
import { writeOutput, type OutputSink } from '../output.js';
import { delegate } from '../pipeline.js';
import { ttlToDate, type Ttl } from '../time.js';
import { Biscuit } from '../token/biscuit.js';
import { BlockBuilder } from '../token/block.js';

/**
 * What every new block accepts besides its Datalog
 */
export interface BlockSettings {
  params: readonly Param[];
  context?: string;
  ttl?: Ttl;
}

/**
 * Parse the block, bind its params, then attach the context and the
 * expiration check
 */
export function buildBlock<T extends BlockBuilder>(
  log: Logger,
  create: (source: string, params: readonly Param[]) => T,
  source: string,
  settings: BlockSettings,
  now: Date
): T {
  return delegate(log, 'build block', () => {
    const builder = create(source, settings.params);
    if (settings.context !== undefined) {
      builder.setContext(settings.context);
    }
    if (settings.ttl) {
      builder.checkExpirationDate(ttlToDate(settings.ttl, now));
    }
    return builder;
  });
}

export function newBlock(source: string, params: readonly Param[]): BlockBuilder {
  return BlockBuilder.fromSource(source, params);
}

export function decodeToken(log: Logger, bytes: Uint8Array): Biscuit {
  return delegate(log, 'decode token', () => Biscuit.fromBytes(bytes));
}

/**
 * Emit step of every command whose result is a serialized payload
 */
export function payloadOutput(raw: boolean): (payload: Uint8Array, out: OutputSink) => void {
  return (payload, out) => writeOutput(out, payload, raw);
}
