/**
 * Datalog syntax tree shared by blocks, authorizers, queries and snapshots.
 * Every node is plain JSON so blocks can be canonicalized and signed as-is.
 */

export type Term =
  | { type: 'variable'; name: string }
  | { type: 'parameter'; name: string }
  | { type: 'string'; value: string }
  | { type: 'integer'; value: number }
  /** seconds since the Unix epoch */
  | { type: 'date'; value: number }
  /** lowercase hex */
  | { type: 'bytes'; value: string }
  | { type: 'bool'; value: boolean };

export type Value = Exclude<Term, { type: 'variable' } | { type: 'parameter' }>;

export interface Predicate {
  name: string;
  terms: Term[];
}

export type Fact = Predicate;

export const OPERATORS = ['==', '!=', '<=', '>=', '<', '>'] as const;
export type Operator = (typeof OPERATORS)[number];

export const METHODS = ['starts_with', 'ends_with', 'contains'] as const;
export type Method = (typeof METHODS)[number];

export type Operand = Term | { type: 'length'; of: Term };

export type Expression =
  | { type: 'compare'; op: Operator; left: Operand; right: Operand }
  | { type: 'method'; method: Method; target: Term; argument: Term }
  | { type: 'literal'; term: Term };

export type Scope =
  | { type: 'authority' }
  | { type: 'previous' }
  /** prefixed public key string, e.g. `ed25519/…` */
  | { type: 'public_key'; key: string }
  | { type: 'parameter'; name: string };

export interface Query {
  body: Predicate[];
  expressions: Expression[];
  scopes: Scope[];
}

export interface Rule extends Query {
  head: Predicate;
}

export interface Check {
  kind: 'if' | 'all';
  queries: Query[];
}

export interface Policy {
  kind: 'allow' | 'deny';
  queries: Query[];
}

/**
 * Contents of a token block
 */
export interface BlockCode {
  facts: Fact[];
  rules: Rule[];
  checks: Check[];
  scopes: Scope[];
}

/**
 * Contents of an authorizer: block contents plus policies
 */
export interface AuthorizerCode extends BlockCode {
  policies: Policy[];
}

export function emptyAuthorizerCode(): AuthorizerCode {
  return { facts: [], rules: [], checks: [], scopes: [], policies: [] };
}

export function isValue(term: Term): term is Value {
  return term.type !== 'variable' && term.type !== 'parameter';
}

export function predicateVariables(predicate: Predicate): string[] {
  return predicate.terms.flatMap((t) => (t.type === 'variable' ? [t.name] : []));
}

function operandTerm(operand: Operand): Term {
  return operand.type === 'length' ? operand.of : operand;
}

export function expressionVariables(expression: Expression): string[] {
  const terms =
    expression.type === 'compare'
      ? [operandTerm(expression.left), operandTerm(expression.right)]
      : expression.type === 'method'
        ? [expression.target, expression.argument]
        : [expression.term];
  return terms.flatMap((t) => (t.type === 'variable' ? [t.name] : []));
}

export function dateFromSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function secondsFromDate(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
