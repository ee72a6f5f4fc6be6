/**
 * The generic command runner.
 *
 * Every command is a definition with the same shape: labelled sources, a
 * resolve step that only reads inputs, an execute step that calls the key,
 * token and authorizer modules, and an emit step that writes the result. The
 * stdin conflict check runs before anything is read, for every command.
 */

import { CliError, DelegateFailure, InternalError } from './errors.js';
import { ensureNoInputConflict, type LabelledSource } from './input/conflicts.js';
import type { InputContext } from './input/resolve.js';
import type { Logger } from './log.js';
import type { OutputSink } from './output.js';

export interface CommandContext {
  io: InputContext;
  out: OutputSink;
  log: Logger;
  now(): Date;
  /** snapshot dumps of `inspect` */
  writeFile(path: string, data: Uint8Array | string): void;
}

export interface CommandDefinition<Resolved, Result> {
  name: string;
  sources: readonly (LabelledSource | undefined)[];
  resolve(io: InputContext, log: Logger): Resolved;
  execute(resolved: Resolved, context: CommandContext): Result;
  emit(result: Result, out: OutputSink): void;
}

/**
 * Run one delegate call, wrapping whatever it throws as a DelegateFailure
 */
export function delegate<T>(log: Logger, step: string, fn: () => T): T {
  log.debug(step);
  try {
    return fn();
  } catch (error) {
    if (error instanceof CliError || error instanceof InternalError) {
      throw error;
    }
    throw new DelegateFailure(step, error);
  }
}

export function runCommand<Resolved, Result>(
  definition: CommandDefinition<Resolved, Result>,
  context: CommandContext
): void {
  const { log } = context;

  log.debug(`${definition.name}: checking inputs`);
  ensureNoInputConflict(definition.sources);

  log.debug(`${definition.name}: resolving inputs`);
  const resolved = definition.resolve(context.io, log);

  const result = delegate(log, definition.name, () => definition.execute(resolved, context));

  log.debug(`${definition.name}: writing output`);
  definition.emit(result, context.out);
}
