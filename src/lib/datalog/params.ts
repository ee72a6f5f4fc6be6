/**
 * Datalog parameters: `--param key[:type]=value` parsing and substitution of
 * `{key}` placeholders in parsed code
 */

import { DatalogError } from '../errors.js';
import { hexToBytes } from '../encoding.js';
import { PublicKey } from '../keys.js';
import { parseRfc3339 } from '../time.js';
import {
  secondsFromDate,
  type AuthorizerCode,
  type Expression,
  type Operand,
  type Predicate,
  type Query,
  type Rule,
  type Scope,
  type Term,
  type Value,
} from './ast.js';

export const PARAM_TYPES = ['string', 'integer', 'date', 'bytes', 'bool', 'pubkey'] as const;
export type ParamType = (typeof PARAM_TYPES)[number];

export type ParamValue = { type: 'term'; value: Value } | { type: 'pubkey'; key: PublicKey };

export interface Param {
  name: string;
  value: ParamValue;
}

function parseValue(type: ParamType, raw: string): ParamValue {
  switch (type) {
    case 'string':
      return { type: 'term', value: { type: 'string', value: raw } };
    case 'integer': {
      if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
        throw new Error(`"${raw}" is not a valid integer`);
      }
      return { type: 'term', value: { type: 'integer', value: Number(raw) } };
    }
    case 'date': {
      const date = parseRfc3339(raw);
      if (!date) {
        throw new Error(`"${raw}" is not an RFC 3339 date`);
      }
      return { type: 'term', value: { type: 'date', value: secondsFromDate(date) } };
    }
    case 'bytes': {
      if (!raw.startsWith('hex:')) {
        throw new Error('bytes values must be hex-encoded and start with "hex:"');
      }
      const hex = raw.slice(4).toLowerCase();
      hexToBytes(hex);
      return { type: 'term', value: { type: 'bytes', value: hex } };
    }
    case 'bool': {
      if (raw !== 'true' && raw !== 'false') {
        throw new Error(`"${raw}" is not a boolean (expected true or false)`);
      }
      return { type: 'term', value: { type: 'bool', value: raw === 'true' } };
    }
    case 'pubkey': {
      if (!raw.startsWith('ed25519/') && !raw.startsWith('secp256r1/')) {
        throw new Error('public keys must be hex-encoded and start with "ed25519/" or "secp256r1/"');
      }
      return { type: 'pubkey', key: PublicKey.fromString(raw) };
    }
  }
}

/**
 * Parse `key[:type]=value`; the type defaults to string
 */
export function parseParam(text: string): Param {
  const eq = text.indexOf('=');
  if (eq === -1) {
    throw new Error(`Invalid param "${text}": expected key[:type]=value`);
  }

  const declaration = text.slice(0, eq);
  const raw = text.slice(eq + 1);
  const colon = declaration.indexOf(':');
  const name = colon === -1 ? declaration : declaration.slice(0, colon);
  const typeName = colon === -1 ? 'string' : declaration.slice(colon + 1);

  if (!/^[A-Za-z0-9_]+$/.test(name)) {
    throw new Error(`Invalid param name "${name}"`);
  }
  const type = PARAM_TYPES.find((t) => t === typeName);
  if (type === undefined) {
    throw new Error(`Unknown param type "${typeName}" (expected one of ${PARAM_TYPES.join(', ')})`);
  }

  return { name, value: parseValue(type, raw) };
}

/**
 * Substitutes `{name}` placeholders and tracks which params were used, so
 * that several pieces of code (an authorizer and a query) can share one set
 * of params
 */
export class ParamBinder {
  private readonly values = new Map<string, ParamValue>();
  private readonly used = new Set<string>();

  constructor(params: readonly Param[]) {
    for (const param of params) {
      this.values.set(param.name, param.value);
    }
  }

  private term(term: Term): Term {
    if (term.type !== 'parameter') {
      return term;
    }
    const value = this.values.get(term.name);
    if (value === undefined) {
      throw new DatalogError(`Unbound parameter {${term.name}}`);
    }
    if (value.type !== 'term') {
      throw new DatalogError(`Parameter {${term.name}} is a public key and can only be used in a trusting scope`);
    }
    this.used.add(term.name);
    return value.value;
  }

  private operand(operand: Operand): Operand {
    return operand.type === 'length' ? { type: 'length', of: this.term(operand.of) } : this.term(operand);
  }

  private expression(expression: Expression): Expression {
    switch (expression.type) {
      case 'compare':
        return { ...expression, left: this.operand(expression.left), right: this.operand(expression.right) };
      case 'method':
        return { ...expression, target: this.term(expression.target), argument: this.term(expression.argument) };
      case 'literal':
        return { ...expression, term: this.term(expression.term) };
    }
  }

  private predicate(predicate: Predicate): Predicate {
    return { name: predicate.name, terms: predicate.terms.map((t) => this.term(t)) };
  }

  private scope(scope: Scope): Scope {
    if (scope.type !== 'parameter') {
      return scope;
    }
    const value = this.values.get(scope.name);
    if (value === undefined) {
      throw new DatalogError(`Unbound parameter {${scope.name}}`);
    }
    if (value.type !== 'pubkey') {
      throw new DatalogError(`Parameter {${scope.name}} is used as a trusting scope but is not a public key`);
    }
    this.used.add(scope.name);
    return { type: 'public_key', key: value.key.toString() };
  }

  private query(query: Query): Query {
    return {
      body: query.body.map((p) => this.predicate(p)),
      expressions: query.expressions.map((e) => this.expression(e)),
      scopes: query.scopes.map((s) => this.scope(s)),
    };
  }

  rule(rule: Rule): Rule {
    return { head: this.predicate(rule.head), ...this.query(rule) };
  }

  code(code: AuthorizerCode): AuthorizerCode {
    return {
      facts: code.facts.map((f) => this.predicate(f)),
      rules: code.rules.map((r) => this.rule(r)),
      checks: code.checks.map((c) => ({ kind: c.kind, queries: c.queries.map((q) => this.query(q)) })),
      policies: code.policies.map((p) => ({ kind: p.kind, queries: p.queries.map((q) => this.query(q)) })),
      scopes: code.scopes.map((s) => this.scope(s)),
    };
  }

  /**
   * Fail when a param was supplied but never used
   */
  assertAllUsed(): void {
    const unused = [...this.values.keys()].filter((name) => !this.used.has(name));
    if (unused.length > 0) {
      throw new DatalogError(`Unused parameters: ${unused.join(', ')}`);
    }
  }
}

/**
 * Replace every `{name}` placeholder with its param value. Unbound
 * placeholders and params the code never uses are both errors.
 */
export function bindParams(code: AuthorizerCode, params: readonly Param[]): AuthorizerCode {
  const binder = new ParamBinder(params);
  const bound = binder.code(code);
  binder.assertAllUsed();
  return bound;
}
