/**
 * Inspection reports: human-readable text and JSON for tokens and authorizer
 * snapshots
 */

import type { AuthorizationSuccess } from './authorizer.js';
import type { AuthorizerCode, Fact } from './datalog/ast.js';
import { printAuthorizer, printPredicate } from './datalog/printer.js';
import { formatRfc3339 } from './time.js';
import type { Block } from './token/block.js';

const RULE = '\u2501'.repeat(41); // ━

export interface BlockReport {
  index: number;
  revocationId: string;
  context?: string;
  externalKey?: string;
  code: string;
}

export type SignatureReport = { status: 'valid'; publicKey: string } | { status: 'skipped' };

export type AuthorizationReport =
  | { status: 'allowed'; policy: string; index: number }
  | { status: 'failed'; error: string }
  | { status: 'skipped'; reason: string };

export type QueryReport = { status: 'done'; rule: string; all: boolean; facts: string[] } | { status: 'skipped'; reason: string };

export interface SnapshotDump {
  kind: 'authorizer' | 'policies';
  path: string;
}

export interface TokenReport {
  sealed: boolean;
  rootKeyId?: number;
  blocks: BlockReport[];
  signature: SignatureReport;
  authorization?: AuthorizationReport;
  query?: QueryReport;
  snapshots: SnapshotDump[];
}

export interface SnapshotReport {
  time?: string;
  code: string;
  blocks: BlockReport[];
  authorization: AuthorizationReport;
  query?: QueryReport;
}

export function blockReport(block: Block): BlockReport {
  return {
    index: block.index,
    revocationId: block.revocationId,
    ...(block.context !== undefined ? { context: block.context } : {}),
    ...(block.externalKey ? { externalKey: block.externalKey.toString() } : {}),
    code: block.source,
  };
}

export function allowedReport(success: AuthorizationSuccess): AuthorizationReport {
  return { status: 'allowed', policy: success.policy, index: success.index };
}

export function queryReport(rule: string, all: boolean, facts: Fact[]): QueryReport {
  return { status: 'done', rule, all, facts: facts.map(printPredicate) };
}

export function snapshotReport(
  code: AuthorizerCode,
  time: Date | undefined,
  blocks: Block[],
  authorization: AuthorizationReport,
  query?: QueryReport
): SnapshotReport {
  return {
    ...(time ? { time: formatRfc3339(time) } : {}),
    code: printAuthorizer(code),
    blocks: blocks.map(blockReport),
    authorization,
    ...(query ? { query } : {}),
  };
}

function indent(code: string): string[] {
  const lines = code.split('\n').filter((line) => line.length > 0);
  return lines.length > 0 ? lines.map((line) => `  ${line}`) : ['  (empty)'];
}

function formatBlock(block: BlockReport): string[] {
  const lines = [block.index === 0 ? 'Block 0 (authority):' : `Block ${block.index}:`];
  lines.push(`  Revocation id: ${block.revocationId}`);
  if (block.context !== undefined) {
    lines.push(`  Context: ${block.context}`);
  }
  if (block.externalKey) {
    lines.push(`  Signed by third party: ${block.externalKey}`);
  }
  lines.push(...indent(block.code));
  return lines;
}

function formatAuthorization(report: AuthorizationReport): string[] {
  switch (report.status) {
    case 'allowed':
      return [`Authorization: ALLOWED ✓ (policy #${report.index}: ${report.policy})`];
    case 'failed':
      return ['Authorization: FAILED ✗', ...report.error.split('\n').map((line) => `  ${line}`)];
    case 'skipped':
      return [`Authorization: skipped (${report.reason})`];
  }
}

function formatQuery(report: QueryReport): string[] {
  if (report.status === 'skipped') {
    return [`Query: skipped (${report.reason})`];
  }
  const scope = report.all ? ' (all blocks)' : '';
  return [`Query${scope}: ${report.rule}`, ...(report.facts.length > 0 ? report.facts.map((f) => `  ${f}`) : ['  no facts'])];
}

/**
 * Human-readable token report
 */
export function formatTokenReport(report: TokenReport): string {
  const lines: string[] = [];

  lines.push(`Biscuit token (${report.sealed ? 'sealed' : 'attenuable'})`);
  lines.push(RULE);
  if (report.rootKeyId !== undefined) {
    lines.push(`Root key id: ${report.rootKeyId}`);
  }
  lines.push(`Blocks: ${report.blocks.length}`);

  for (const block of report.blocks) {
    lines.push('');
    lines.push(...formatBlock(block));
  }

  lines.push('');
  if (report.signature.status === 'valid') {
    lines.push(`Signature: VALID ✓ (${report.signature.publicKey})`);
  } else {
    lines.push('Signature: not checked (no public key given)');
  }
  if (report.authorization) {
    lines.push(...formatAuthorization(report.authorization));
  }
  if (report.query) {
    lines.push(...formatQuery(report.query));
  }
  for (const dump of report.snapshots) {
    lines.push(`${dump.kind === 'authorizer' ? 'Authorizer' : 'Policies'} snapshot written to: ${dump.path}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Human-readable snapshot report
 */
export function formatSnapshotReport(report: SnapshotReport): string {
  const lines: string[] = [];

  lines.push('Authorizer snapshot');
  lines.push(RULE);
  lines.push(`Time: ${report.time ?? 'not set'}`);
  lines.push(`Token blocks: ${report.blocks.length}`);

  for (const block of report.blocks) {
    lines.push('');
    lines.push(...formatBlock(block));
  }

  lines.push('');
  lines.push('Authorizer:');
  lines.push(...indent(report.code));

  lines.push('');
  lines.push(...formatAuthorization(report.authorization));
  if (report.query) {
    lines.push(...formatQuery(report.query));
  }

  return lines.join('\n') + '\n';
}

/**
 * JSON form of either report
 */
export function formatJson(report: TokenReport | SnapshotReport): string {
  return JSON.stringify(report, null, 2) + '\n';
}
