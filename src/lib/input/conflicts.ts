import { MultipleStdinConsumers } from '../errors.js';
import type { Source } from './sources.js';

export interface LabelledSource {
  /** how the input is named in messages, e.g. `the token` */
  label: string;
  source: Source;
}

/**
 * Standard input sources, and the editor, which takes over the terminal
 */
export function consumesStdin(source: Source): boolean {
  return source.type === 'stdin' || source.type === 'editor';
}

/**
 * Reject an invocation where two inputs would both read standard input. Runs
 * before any input is resolved.
 */
export function ensureNoInputConflict(sources: readonly (LabelledSource | undefined)[]): void {
  let first: LabelledSource | undefined;
  for (const labelled of sources) {
    if (!labelled || !consumesStdin(labelled.source)) continue;
    if (first) {
      throw new MultipleStdinConsumers([first.label, labelled.label]);
    }
    first = labelled;
  }
}
