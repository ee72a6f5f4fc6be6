/**
 * Inspect a token: print its blocks, and optionally verify its signature,
 * authorize it, query it and dump snapshots of the authorizer
 */

import { Authorizer } from '../authorizer.js';
import type { Rule } from '../datalog/ast.js';
import { ParamBinder, type Param } from '../datalog/params.js';
import { parseAuthorizer } from '../datalog/parser.js';
import { printRule } from '../datalog/printer.js';
import type { RunLimits } from '../datalog/world.js';
import { IoFailure } from '../errors.js';
import { resolveDatalog, resolvePublicKey, resolveToken } from '../input/resolve.js';
import type { AuthorizerSource, KeySource, TokenSource } from '../input/sources.js';
import type { PublicKey } from '../keys.js';
import type { Logger } from '../log.js';
import { encodeOutput } from '../output.js';
import { delegate, type CommandContext, type CommandDefinition } from '../pipeline.js';
import {
  allowedReport,
  blockReport,
  formatJson,
  formatTokenReport,
  queryReport,
  type SnapshotDump,
  type TokenReport,
} from '../report.js';
import type { Biscuit } from '../token/biscuit.js';
import { decodeToken } from './shared.js';

export interface QueryOptions {
  query?: Rule;
  /** trust every block, not only the authority, the authorizer and trusted blocks */
  queryAll: boolean;
}

export interface SnapshotDumpOptions {
  path: string;
  raw: boolean;
}

export interface InspectOptions extends QueryOptions {
  token: TokenSource;
  publicKey?: KeySource;
  authorizer?: AuthorizerSource;
  includeTime: boolean;
  params: readonly Param[];
  limits: RunLimits;
  dumpSnapshot?: SnapshotDumpOptions;
  dumpPoliciesSnapshot?: SnapshotDumpOptions;
  json: boolean;
}

type ResolvedAuthorizer = { type: 'datalog'; source: string } | { type: 'snapshot'; bytes: Uint8Array };

interface Resolved {
  token: Uint8Array;
  publicKey?: PublicKey;
  authorizer?: ResolvedAuthorizer;
}

function writeSnapshot(context: CommandContext, kind: SnapshotDump['kind'], dump: SnapshotDumpOptions, bytes: Uint8Array): SnapshotDump {
  context.log.debug(`writing ${kind} snapshot to ${dump.path}`);
  try {
    context.writeFile(dump.path, encodeOutput(bytes, dump.raw));
  } catch (error) {
    throw new IoFailure(dump.path, error, 'write');
  }
  return { kind, path: dump.path };
}

function buildAuthorizer(log: Logger, resolved: ResolvedAuthorizer | undefined, binder: ParamBinder): Authorizer {
  if (!resolved) {
    return new Authorizer();
  }
  if (resolved.type === 'snapshot') {
    const { bytes } = resolved;
    return delegate(log, 'load policies snapshot', () => Authorizer.fromSnapshot(bytes, { policiesOnly: true }));
  }
  const { source } = resolved;
  return delegate(log, 'parse authorizer', () => new Authorizer(binder.code(parseAuthorizer(source))));
}

function inspectToken(options: InspectOptions, resolved: Resolved, token: Biscuit, context: CommandContext): TokenReport {
  const { log } = context;
  const report: TokenReport = {
    sealed: token.sealed,
    ...(token.rootKeyId !== undefined ? { rootKeyId: token.rootKeyId } : {}),
    blocks: token.blocks().map(blockReport),
    signature: { status: 'skipped' },
    snapshots: [],
  };

  const { publicKey } = resolved;
  if (!publicKey) {
    const reason = 'the signature was not checked';
    if (resolved.authorizer) report.authorization = { status: 'skipped', reason };
    if (options.query) report.query = { status: 'skipped', reason };
    if (options.params.length > 0) log.warn('parameters are ignored when no public key is given');
    if (options.dumpSnapshot || options.dumpPoliciesSnapshot) log.warn('snapshots are only written for a verified token');
    return report;
  }

  delegate(log, 'verify signature', () => token.verify(publicKey));
  report.signature = { status: 'valid', publicKey: publicKey.toString() };

  if (!resolved.authorizer && !options.query && !options.dumpSnapshot && !options.dumpPoliciesSnapshot) {
    if (options.params.length > 0) log.warn('parameters are ignored without an authorizer or a query');
    return report;
  }

  const binder = new ParamBinder(options.params);
  const authorizer = buildAuthorizer(log, resolved.authorizer, binder);
  const rule = options.query;
  const query = rule ? delegate(log, 'bind query parameters', () => binder.rule(rule)) : undefined;
  if (resolved.authorizer?.type === 'datalog' || query) {
    delegate(log, 'check parameters', () => binder.assertAllUsed());
  }

  if (options.includeTime) {
    authorizer.setTime(context.now());
  }
  authorizer.addToken(token);

  if (resolved.authorizer) {
    const success = delegate(log, 'authorize', () => authorizer.authorize(options.limits));
    report.authorization = allowedReport(success);
  }

  if (query) {
    const facts = delegate(log, 'query', () => authorizer.query(query, { all: options.queryAll, limits: options.limits }));
    report.query = queryReport(printRule(query), options.queryAll, facts);
  }

  if (options.dumpSnapshot) {
    report.snapshots.push(writeSnapshot(context, 'authorizer', options.dumpSnapshot, authorizer.snapshot()));
  }
  if (options.dumpPoliciesSnapshot) {
    report.snapshots.push(writeSnapshot(context, 'policies', options.dumpPoliciesSnapshot, authorizer.policiesSnapshot()));
  }

  return report;
}

export function inspectCommand(options: InspectOptions): CommandDefinition<Resolved, string> {
  const authorizerSource = options.authorizer;

  return {
    name: 'inspect',
    sources: [
      { label: 'the token', source: options.token },
      options.publicKey && { label: 'the public key', source: options.publicKey },
      authorizerSource && { label: 'the authorizer', source: authorizerSource.source },
    ],
    resolve: (io) => {
      const token = resolveToken(options.token, io);
      const publicKey = options.publicKey && resolvePublicKey(options.publicKey, io);
      let authorizer: ResolvedAuthorizer | undefined;
      if (authorizerSource?.type === 'datalog') {
        authorizer = { type: 'datalog', source: resolveDatalog(authorizerSource.source, io, 'the authorizer') };
      } else if (authorizerSource?.type === 'snapshot') {
        authorizer = { type: 'snapshot', bytes: resolveToken(authorizerSource.source, io, 'policies snapshot') };
      }
      return {
        token,
        ...(publicKey ? { publicKey } : {}),
        ...(authorizer ? { authorizer } : {}),
      };
    },
    execute: (resolved, context) => {
      const token = decodeToken(context.log, resolved.token);
      const report = inspectToken(options, resolved, token, context);
      return options.json ? formatJson(report) : formatTokenReport(report);
    },
    emit: (text, out) => out.write(text),
  };
}
