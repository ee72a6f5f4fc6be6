/**
 * Datalog parser: blocks, authorizers, rules for queries
 *
 * Statements end with `;`. Supported statements:
 *   fact("value", 1);
 *   head($x) <- body($x), $x > 1 trusting authority;
 *   check if query or query;   check all query;
 *   allow if query;   deny if query;
 *   trusting ed25519/<hex>;   (block-level scope)
 */

import { DatalogError, errorMessage } from '../errors.js';
import { hexToBytes } from '../encoding.js';
import { parseRfc3339 } from '../time.js';
import {
  METHODS,
  OPERATORS,
  emptyAuthorizerCode,
  secondsFromDate,
  expressionVariables,
  predicateVariables,
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

type TokenKind =
  | 'arrow'
  | 'op'
  | 'punct'
  | 'string'
  | 'date'
  | 'integer'
  | 'bytes'
  | 'pubkey'
  | 'variable'
  | 'parameter'
  | 'ident';

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const TOKEN_PATTERNS: Array<[TokenKind, RegExp]> = [
  ['arrow', /<-/y],
  ['op', /==|!=|<=|>=|<|>/y],
  ['punct', /[(),;.]/y],
  ['string', /"(?:[^"\\]|\\.)*"/y],
  ['date', /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})/y],
  ['integer', /-?\d+/y],
  ['bytes', /hex:[0-9a-fA-F]*/y],
  ['pubkey', /(?:ed25519|secp256r1)\/[0-9a-fA-F]+/y],
  ['variable', /\$[A-Za-z0-9_]+/y],
  ['parameter', /\{[A-Za-z0-9_]+\}/y],
  ['ident', /[A-Za-z_][A-Za-z0-9_]*/y],
];

const SKIP_PATTERN = /(?:\s+|\/\/[^\n]*|\/\*[\s\S]*?\*\/)+/y;

function lineAndColumn(source: string, position: number): string {
  const before = source.slice(0, position).split('\n');
  return `line ${before.length}, column ${before[before.length - 1].length + 1}`;
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < source.length) {
    SKIP_PATTERN.lastIndex = position;
    if (SKIP_PATTERN.test(source)) {
      position = SKIP_PATTERN.lastIndex;
      continue;
    }

    let matched = false;
    for (const [kind, pattern] of TOKEN_PATTERNS) {
      pattern.lastIndex = position;
      const match = pattern.exec(source);
      if (match) {
        tokens.push({ kind, text: match[0], position });
        position = pattern.lastIndex;
        matched = true;
        break;
      }
    }

    if (!matched) {
      throw new DatalogError(
        `Unexpected character '${source[position]}' at ${lineAndColumn(source, position)}`
      );
    }
  }

  return tokens;
}

function unescapeString(literal: string): string {
  return literal.slice(1, -1).replace(/\\(.)/g, (_, c: string) => {
    switch (c) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      default:
        return c;
    }
  });
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  private fail(message: string, token = this.peek()): never {
    const where = token ? lineAndColumn(this.source, token.position) : 'end of input';
    throw new DatalogError(`${message} at ${where}`);
  }

  private next(): Token {
    const token = this.peek();
    if (!token) {
      this.fail('Unexpected end of input');
    }
    this.index++;
    return token;
  }

  private isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token !== undefined && token.kind === 'punct' && token.text === text;
  }

  private isKeyword(text: string): boolean {
    const token = this.peek();
    return token !== undefined && token.kind === 'ident' && token.text === text;
  }

  private expectPunct(text: string): void {
    const token = this.next();
    if (token.kind !== 'punct' || token.text !== text) {
      this.fail(`Expected '${text}' but found '${token.text}'`, token);
    }
  }

  private expectKeyword(text: string): void {
    const token = this.next();
    if (token.kind !== 'ident' || token.text !== text) {
      this.fail(`Expected '${text}' but found '${token.text}'`, token);
    }
  }

  /**
   * Parse every statement of a block or authorizer
   */
  statements(allowPolicies: boolean): AuthorizerCode {
    const code = emptyAuthorizerCode();

    while (!this.atEnd()) {
      if (this.isKeyword('check')) {
        code.checks.push(this.check());
      } else if (this.isKeyword('allow') || this.isKeyword('deny')) {
        if (!allowPolicies) {
          this.fail('Policies are only allowed in authorizers');
        }
        code.policies.push(this.policy());
      } else if (this.isKeyword('trusting')) {
        this.next();
        code.scopes.push(...this.scopes());
      } else {
        const start = this.peek();
        const head = this.predicate();
        if (this.peek()?.kind === 'arrow') {
          this.next();
          code.rules.push(this.finishRule(head, start));
        } else {
          if (predicateVariables(head).length > 0) {
            this.fail(`Facts cannot contain variables: ${head.name}`, start);
          }
          code.facts.push(head);
        }
      }
      this.expectPunct(';');
    }

    return code;
  }

  /**
   * Parse a single rule, as used by queries
   */
  singleRule(): Rule {
    const start = this.peek();
    const head = this.predicate();
    const arrow = this.next();
    if (arrow.kind !== 'arrow') {
      this.fail(`Expected '<-' but found '${arrow.text}'`, arrow);
    }
    const rule = this.finishRule(head, start);
    if (this.isPunct(';')) {
      this.next();
    }
    if (!this.atEnd()) {
      this.fail('Unexpected input after rule');
    }
    return rule;
  }

  private finishRule(head: Predicate, start: Token | undefined): Rule {
    const query = this.query();
    const bound = new Set(query.body.flatMap(predicateVariables));
    const unbound = predicateVariables(head).find((v) => !bound.has(v));
    if (unbound !== undefined) {
      this.fail(`Head variable $${unbound} does not appear in the rule body`, start);
    }
    return { head, ...query };
  }

  private check(): Check {
    this.expectKeyword('check');
    const kindToken = this.next();
    if (kindToken.kind !== 'ident' || (kindToken.text !== 'if' && kindToken.text !== 'all')) {
      this.fail(`Expected 'if' or 'all' after 'check'`, kindToken);
    }
    return { kind: kindToken.text === 'all' ? 'all' : 'if', queries: this.queries() };
  }

  private policy(): Policy {
    const kind = this.next().text === 'allow' ? 'allow' : 'deny';
    this.expectKeyword('if');
    return { kind, queries: this.queries() };
  }

  private queries(): Query[] {
    const queries = [this.query()];
    while (this.isKeyword('or')) {
      this.next();
      queries.push(this.query());
    }
    return queries;
  }

  private query(): Query {
    const start = this.peek();
    const body: Predicate[] = [];
    const expressions: Expression[] = [];

    do {
      if (body.length + expressions.length > 0) {
        this.next();
      }
      if (this.startsPredicate()) {
        body.push(this.predicate());
      } else {
        expressions.push(this.expression());
      }
    } while (this.isPunct(','));

    let scopes: Scope[] = [];
    if (this.isKeyword('trusting')) {
      this.next();
      scopes = this.scopes();
    }

    const bound = new Set(body.flatMap(predicateVariables));
    const unbound = expressions.flatMap(expressionVariables).find((v) => !bound.has(v));
    if (unbound !== undefined) {
      this.fail(`Variable $${unbound} is used in an expression but bound by no predicate`, start);
    }

    return { body, expressions, scopes };
  }

  private startsPredicate(): boolean {
    const token = this.peek();
    return (
      token !== undefined &&
      token.kind === 'ident' &&
      token.text !== 'true' &&
      token.text !== 'false' &&
      this.isPunct('(', 1)
    );
  }

  private predicate(): Predicate {
    const name = this.next();
    if (name.kind !== 'ident') {
      this.fail(`Expected a predicate name but found '${name.text}'`, name);
    }
    this.expectPunct('(');
    const terms: Term[] = [];
    if (!this.isPunct(')')) {
      terms.push(this.term());
      while (this.isPunct(',')) {
        this.next();
        terms.push(this.term());
      }
    }
    this.expectPunct(')');
    return { name: name.text, terms };
  }

  private term(): Term {
    const token = this.next();
    switch (token.kind) {
      case 'variable':
        return { type: 'variable', name: token.text.slice(1) };
      case 'parameter':
        return { type: 'parameter', name: token.text.slice(1, -1) };
      case 'string':
        return { type: 'string', value: unescapeString(token.text) };
      case 'integer': {
        const value = Number(token.text);
        if (!Number.isSafeInteger(value)) {
          this.fail(`Integer out of range: ${token.text}`, token);
        }
        return { type: 'integer', value };
      }
      case 'date': {
        const date = parseRfc3339(token.text);
        if (!date) {
          this.fail(`Invalid date: ${token.text}`, token);
        }
        return { type: 'date', value: secondsFromDate(date) };
      }
      case 'bytes': {
        const hex = token.text.slice(4).toLowerCase();
        try {
          hexToBytes(hex);
        } catch (error) {
          this.fail(`Invalid bytes literal ${token.text}: ${errorMessage(error)}`, token);
        }
        return { type: 'bytes', value: hex };
      }
      case 'ident':
        if (token.text === 'true' || token.text === 'false') {
          return { type: 'bool', value: token.text === 'true' };
        }
        break;
      default:
        break;
    }
    this.fail(`Expected a term but found '${token.text}'`, token);
  }

  private operand(): Operand {
    const term = this.term();
    if (this.isPunct('.') && this.peek(1)?.text === 'length') {
      this.next();
      this.next();
      this.expectPunct('(');
      this.expectPunct(')');
      return { type: 'length', of: term };
    }
    return term;
  }

  private expression(): Expression {
    const left = this.operand();

    if (left.type !== 'length' && this.isPunct('.')) {
      this.next();
      const name = this.next();
      const method = METHODS.find((m) => m === name.text);
      if (method === undefined) {
        this.fail(`Unknown method '${name.text}'`, name);
      }
      this.expectPunct('(');
      const argument = this.term();
      this.expectPunct(')');
      return { type: 'method', method, target: left, argument };
    }

    const token = this.peek();
    const op = OPERATORS.find((o) => token?.kind === 'op' && o === token.text);
    if (op !== undefined) {
      this.next();
      const right = this.operand();
      return { type: 'compare', op, left, right };
    }

    if (left.type === 'bool' || left.type === 'variable' || left.type === 'parameter') {
      return { type: 'literal', term: left };
    }
    this.fail(`Expected an operator after the term`);
  }

  private scopes(): Scope[] {
    const scopes = [this.scope()];
    while (this.isPunct(',')) {
      this.next();
      scopes.push(this.scope());
    }
    return scopes;
  }

  private scope(): Scope {
    const token = this.next();
    if (token.kind === 'ident' && token.text === 'authority') {
      return { type: 'authority' };
    }
    if (token.kind === 'ident' && token.text === 'previous') {
      return { type: 'previous' };
    }
    if (token.kind === 'pubkey') {
      return { type: 'public_key', key: token.text.toLowerCase() };
    }
    if (token.kind === 'parameter') {
      return { type: 'parameter', name: token.text.slice(1, -1) };
    }
    this.fail(`Expected a scope (authority, previous or a public key) but found '${token.text}'`, token);
  }
}

/**
 * Parse the source of a token block: facts, rules, checks and scopes
 */
export function parseBlock(source: string): BlockCode {
  const { facts, rules, checks, scopes } = new Parser(source, tokenize(source)).statements(false);
  return { facts, rules, checks, scopes };
}

/**
 * Parse the source of an authorizer: block contents plus policies
 */
export function parseAuthorizer(source: string): AuthorizerCode {
  return new Parser(source, tokenize(source)).statements(true);
}

/**
 * Parse a single rule, e.g. a `--query` argument
 */
export function parseRule(source: string): Rule {
  return new Parser(source, tokenize(source)).singleRule();
}
