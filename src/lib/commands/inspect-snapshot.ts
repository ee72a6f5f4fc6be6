import { Authorizer } from '../authorizer.js';
import { ParamBinder, type Param } from '../datalog/params.js';
import { printRule } from '../datalog/printer.js';
import type { RunLimits } from '../datalog/world.js';
import { AuthorizationError } from '../errors.js';
import { resolveToken } from '../input/resolve.js';
import type { TokenSource } from '../input/sources.js';
import { delegate, type CommandDefinition } from '../pipeline.js';
import {
  allowedReport,
  formatJson,
  formatSnapshotReport,
  queryReport,
  snapshotReport,
  type AuthorizationReport,
} from '../report.js';
import type { QueryOptions } from './inspect.js';

export interface InspectSnapshotOptions extends QueryOptions {
  snapshot: TokenSource;
  params: readonly Param[];
  limits: RunLimits;
  json: boolean;
}

/**
 * Print a stored authorizer, re-run its authorization and optionally query it.
 * A failed authorization is part of the report, not an error.
 */
export function inspectSnapshotCommand(options: InspectSnapshotOptions): CommandDefinition<Uint8Array, string> {
  return {
    name: 'inspect-snapshot',
    sources: [{ label: 'the snapshot', source: options.snapshot }],
    resolve: (io) => resolveToken(options.snapshot, io, 'snapshot'),
    execute: (bytes, { log }) => {
      const authorizer = delegate(log, 'load snapshot', () => Authorizer.fromSnapshot(bytes));

      const binder = new ParamBinder(options.params);
      const rule = options.query;
      const query = rule ? delegate(log, 'bind query parameters', () => binder.rule(rule)) : undefined;
      delegate(log, 'check parameters', () => binder.assertAllUsed());

      let authorization: AuthorizationReport;
      try {
        authorization = allowedReport(authorizer.authorize(options.limits));
      } catch (error) {
        if (!(error instanceof AuthorizationError)) throw error;
        authorization = { status: 'failed', error: error.message };
      }

      const facts = query && delegate(log, 'query', () => authorizer.query(query, { all: options.queryAll, limits: options.limits }));
      const report = snapshotReport(
        authorizer.code,
        authorizer.currentTime,
        authorizer.tokenBlocks,
        authorization,
        query && facts ? queryReport(printRule(query), options.queryAll, facts) : undefined
      );
      return options.json ? formatJson(report) : formatSnapshotReport(report);
    },
    emit: (text, out) => out.write(text),
  };
}
