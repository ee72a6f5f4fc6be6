/**
 * Forward-chaining Datalog evaluation with origin tracking and run limits.
 *
 * Every fact remembers the set of blocks it was derived from. A rule only sees
 * facts whose origins all belong to the rule's trusted origins: by default the
 * authority block, the rule's own block and the authorizer.
 */

import { AuthorizationError, DatalogError } from '../errors.js';
import { hexToBytes } from '../encoding.js';
import type { Expression, Fact, Operand, Operator, Predicate, Query, Rule, Scope, Term, Value } from './ast.js';

/** Origin of authorizer facts, rules, checks and policies */
export const AUTHORIZER_ORIGIN = 2 ** 31;

export interface RunLimits {
  maxFacts: number;
  maxIterations: number;
  maxTimeMs: number;
}

export const DEFAULT_RUN_LIMITS: RunLimits = {
  maxFacts: 1000,
  maxIterations: 100,
  maxTimeMs: 100,
};

/**
 * Trusted origins for code defined in `origin`, given its scopes. The
 * externally signed blocks are looked up by public key string.
 */
export function trustedOrigins(
  origin: number,
  scopes: readonly Scope[],
  blockCount: number,
  blocksByExternalKey: ReadonlyMap<string, number[]>
): Set<number> {
  const trusted = new Set<number>([origin, AUTHORIZER_ORIGIN]);
  const effective: readonly Scope[] = scopes.length > 0 ? scopes : [{ type: 'authority' }];

  for (const scope of effective) {
    switch (scope.type) {
      case 'authority':
        trusted.add(0);
        break;
      case 'previous': {
        const end = origin === AUTHORIZER_ORIGIN ? blockCount : origin;
        for (let i = 0; i < end; i++) trusted.add(i);
        break;
      }
      case 'public_key':
        for (const block of blocksByExternalKey.get(scope.key) ?? []) trusted.add(block);
        break;
      case 'parameter':
        throw new DatalogError(`Unbound parameter {${scope.name}} in trusting scope`);
    }
  }

  return trusted;
}

interface StoredFact {
  origins: number[];
  fact: Fact;
}

type Bindings = Map<string, Value>;

function valueKey(value: Value): string {
  return JSON.stringify([value.type, value.value]);
}

function factKey(fact: Fact): string {
  return JSON.stringify([
    fact.name,
    fact.terms.map((t) => (t.type === 'variable' || t.type === 'parameter' ? null : [t.type, t.value])),
  ]);
}

function originsKey(origins: readonly number[]): string {
  return origins.join(',');
}

function mergeOrigins(a: readonly number[], b: readonly number[]): number[] {
  return [...new Set([...a, ...b])].sort((x, y) => x - y);
}

function resolveTerm(term: Term, bindings: Bindings): Value {
  if (term.type === 'variable') {
    const value = bindings.get(term.name);
    if (value === undefined) {
      throw new DatalogError(`Unbound variable $${term.name}`);
    }
    return value;
  }
  if (term.type === 'parameter') {
    throw new DatalogError(`Unbound parameter {${term.name}}`);
  }
  return term;
}

function resolveOperand(operand: Operand, bindings: Bindings): Value {
  if (operand.type !== 'length') {
    return resolveTerm(operand, bindings);
  }
  const value = resolveTerm(operand.of, bindings);
  if (value.type === 'string') {
    return { type: 'integer', value: [...value.value].length };
  }
  if (value.type === 'bytes') {
    return { type: 'integer', value: hexToBytes(value.value).length };
  }
  throw new DatalogError(`length() is not defined for ${value.type}`);
}

function compareValues(op: Operator, left: Value, right: Value): boolean {
  if (left.type !== right.type) {
    throw new DatalogError(`Cannot compare ${left.type} with ${right.type}`);
  }
  if (op === '==') return left.value === right.value;
  if (op === '!=') return left.value !== right.value;

  if ((left.type !== 'integer' && left.type !== 'date') || (right.type !== 'integer' && right.type !== 'date')) {
    throw new DatalogError(`Operator ${op} is only defined for integers and dates`);
  }
  switch (op) {
    case '<':
      return left.value < right.value;
    case '>':
      return left.value > right.value;
    case '<=':
      return left.value <= right.value;
    case '>=':
      return left.value >= right.value;
  }
}

/**
 * Evaluate an expression; type errors make it false
 */
function evaluateExpression(expression: Expression, bindings: Bindings): boolean {
  try {
    switch (expression.type) {
      case 'compare':
        return compareValues(expression.op, resolveOperand(expression.left, bindings), resolveOperand(expression.right, bindings));
      case 'literal': {
        const value = resolveTerm(expression.term, bindings);
        return value.type === 'bool' && value.value;
      }
      case 'method': {
        const target = resolveTerm(expression.target, bindings);
        const argument = resolveTerm(expression.argument, bindings);
        if (target.type !== 'string' || argument.type !== 'string') {
          return false;
        }
        switch (expression.method) {
          case 'starts_with':
            return target.value.startsWith(argument.value);
          case 'ends_with':
            return target.value.endsWith(argument.value);
          case 'contains':
            return target.value.includes(argument.value);
        }
      }
    }
  } catch (error) {
    if (error instanceof DatalogError) {
      return false;
    }
    throw error;
  }
}

export interface Match {
  bindings: Bindings;
  origins: number[];
}

interface RuleEntry {
  rule: Rule;
  origin: number;
  trusted: Set<number>;
}

// facts examined between two clock reads while matching
const CLOCK_INTERVAL = 256;

export class World {
  private readonly facts = new Map<string, StoredFact>();
  private readonly rules: RuleEntry[] = [];
  private deadline = Infinity;
  private steps = 0;

  addFact(fact: Fact, origin: number): void {
    this.insert({ origins: [origin], fact });
  }

  addRule(rule: Rule, origin: number, trusted: Set<number>): void {
    this.rules.push({ rule, origin, trusted });
  }

  /**
   * Facts visible from the given trusted origins
   */
  visibleFacts(trusted: ReadonlySet<number>): StoredFact[] {
    return [...this.facts.values()].filter((f) => f.origins.every((o) => trusted.has(o)));
  }

  /**
   * Apply rules until no new fact appears
   */
  run(limits: RunLimits = DEFAULT_RUN_LIMITS): void {
    this.deadline = Date.now() + limits.maxTimeMs;
    let iterations = 0;

    for (;;) {
      const derived: StoredFact[] = [];
      for (const entry of this.rules) {
        for (const match of this.matchQuery(entry.rule, entry.trusted)) {
          const head: Fact = {
            name: entry.rule.head.name,
            terms: entry.rule.head.terms.map((t) => resolveTerm(t, match.bindings)),
          };
          derived.push({ origins: mergeOrigins(match.origins, [entry.origin]), fact: head });
        }
      }

      let added = 0;
      for (const stored of derived) {
        if (this.insert(stored)) added++;
      }
      if (added === 0) {
        return;
      }

      iterations++;
      if (this.facts.size > limits.maxFacts) {
        throw new AuthorizationError({ type: 'run_limit', limit: 'facts' });
      }
      if (iterations >= limits.maxIterations) {
        throw new AuthorizationError({ type: 'run_limit', limit: 'iterations' });
      }
      this.checkDeadline();
    }
  }

  /**
   * Matching after `run`, for checks and policies too, stays under the deadline
   * that `run` set
   */
  private checkDeadline(): void {
    if (Date.now() > this.deadline) {
      throw new AuthorizationError({ type: 'run_limit', limit: 'time' });
    }
  }

  /**
   * Every binding of the query body that satisfies its expressions
   */
  matchQuery(query: Query, trusted: ReadonlySet<number>): Match[] {
    const visible = this.visibleFacts(trusted);
    return this.matchBody(query.body, 0, visible, { bindings: new Map(), origins: [] }).filter((m) =>
      query.expressions.every((e) => evaluateExpression(e, m.bindings))
    );
  }

  /**
   * `check if` semantics: at least one match. `check all`: every body match
   * satisfies the expressions.
   */
  queryMatches(query: Query, trusted: ReadonlySet<number>, kind: 'if' | 'all' = 'if'): boolean {
    if (kind === 'if') {
      return this.matchQuery(query, trusted).length > 0;
    }
    const visible = this.visibleFacts(trusted);
    return this.matchBody(query.body, 0, visible, { bindings: new Map(), origins: [] }).every((m) =>
      query.expressions.every((e) => evaluateExpression(e, m.bindings))
    );
  }

  /**
   * Facts produced by applying a rule once, without storing them
   */
  queryRule(rule: Rule, trusted: ReadonlySet<number>): Fact[] {
    const seen = new Map<string, Fact>();
    for (const match of this.matchQuery(rule, trusted)) {
      const fact: Fact = { name: rule.head.name, terms: rule.head.terms.map((t) => resolveTerm(t, match.bindings)) };
      seen.set(factKey(fact), fact);
    }
    return [...seen.values()];
  }

  private insert(stored: StoredFact): boolean {
    const key = `${originsKey(stored.origins)}|${factKey(stored.fact)}`;
    if (this.facts.has(key)) {
      return false;
    }
    this.facts.set(key, stored);
    return true;
  }

  private matchBody(body: readonly Predicate[], index: number, facts: StoredFact[], current: Match): Match[] {
    if (index >= body.length) {
      return [current];
    }

    const atom = body[index];
    const results: Match[] = [];

    for (const { fact, origins } of facts) {
      if (++this.steps % CLOCK_INTERVAL === 0) {
        this.checkDeadline();
      }
      if (fact.name !== atom.name || fact.terms.length !== atom.terms.length) continue;

      const bindings = new Map(current.bindings);
      let match = true;

      for (let i = 0; i < atom.terms.length; i++) {
        const term = atom.terms[i];
        const value = fact.terms[i];
        if (value.type === 'variable' || value.type === 'parameter') {
          match = false;
          break;
        }

        if (term.type === 'variable') {
          const existing = bindings.get(term.name);
          if (existing === undefined) {
            bindings.set(term.name, value);
          } else if (valueKey(existing) !== valueKey(value)) {
            match = false;
            break;
          }
        } else if (term.type === 'parameter' || valueKey(term) !== valueKey(value)) {
          match = false;
          break;
        }
      }

      if (match) {
        results.push(
          ...this.matchBody(body, index + 1, facts, { bindings, origins: mergeOrigins(current.origins, origins) })
        );
      }
    }

    return results;
  }
}
