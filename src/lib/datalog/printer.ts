/**
 * Render Datalog syntax trees back to parseable source
 */

import { formatRfc3339 } from '../time.js';
import {
  dateFromSeconds,
  type AuthorizerCode,
  type BlockCode,
  type Check,
  type Expression,
  type Operand,
  type Policy,
  type Predicate,
  type Query,
  type Rule,
  type Scope,
  type Term,
} from './ast.js';

function escapeString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
}

export function printTerm(term: Term): string {
  switch (term.type) {
    case 'variable':
      return `$${term.name}`;
    case 'parameter':
      return `{${term.name}}`;
    case 'string':
      return `"${escapeString(term.value)}"`;
    case 'integer':
      return String(term.value);
    case 'date':
      return formatRfc3339(dateFromSeconds(term.value));
    case 'bytes':
      return `hex:${term.value}`;
    case 'bool':
      return String(term.value);
  }
}

export function printPredicate(predicate: Predicate): string {
  return `${predicate.name}(${predicate.terms.map(printTerm).join(', ')})`;
}

function printOperand(operand: Operand): string {
  return operand.type === 'length' ? `${printTerm(operand.of)}.length()` : printTerm(operand);
}

export function printExpression(expression: Expression): string {
  switch (expression.type) {
    case 'compare':
      return `${printOperand(expression.left)} ${expression.op} ${printOperand(expression.right)}`;
    case 'method':
      return `${printTerm(expression.target)}.${expression.method}(${printTerm(expression.argument)})`;
    case 'literal':
      return printTerm(expression.term);
  }
}

export function printScope(scope: Scope): string {
  switch (scope.type) {
    case 'authority':
      return 'authority';
    case 'previous':
      return 'previous';
    case 'public_key':
      return scope.key;
    case 'parameter':
      return `{${scope.name}}`;
  }
}

function printScopes(scopes: Scope[]): string {
  return scopes.length > 0 ? ` trusting ${scopes.map(printScope).join(', ')}` : '';
}

export function printQuery(query: Query): string {
  const elements = [...query.body.map(printPredicate), ...query.expressions.map(printExpression)];
  return elements.join(', ') + printScopes(query.scopes);
}

export function printRule(rule: Rule): string {
  return `${printPredicate(rule.head)} <- ${printQuery(rule)}`;
}

export function printCheck(check: Check): string {
  return `check ${check.kind} ${check.queries.map(printQuery).join(' or ')}`;
}

export function printPolicy(policy: Policy): string {
  return `${policy.kind} if ${policy.queries.map(printQuery).join(' or ')}`;
}

/**
 * Print a block, one statement per line
 */
export function printBlock(code: BlockCode): string {
  const lines = [
    ...(code.scopes.length > 0 ? [`trusting ${code.scopes.map(printScope).join(', ')}`] : []),
    ...code.facts.map(printPredicate),
    ...code.rules.map(printRule),
    ...code.checks.map(printCheck),
  ];
  return lines.map((line) => `${line};\n`).join('');
}

export function printAuthorizer(code: AuthorizerCode): string {
  return printBlock(code) + code.policies.map((p) => `${printPolicy(p)};\n`).join('');
}
