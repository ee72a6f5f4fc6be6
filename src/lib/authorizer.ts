/**
 * Authorization of a token against authorizer code, queries and snapshots
 */

import type { AuthorizerCode, Check, Fact, Query, Rule, Scope } from './datalog/ast.js';
import { emptyAuthorizerCode, secondsFromDate, dateFromSeconds } from './datalog/ast.js';
import { bindParams, type Param } from './datalog/params.js';
import { parseAuthorizer } from './datalog/parser.js';
import { printAuthorizer, printCheck, printPolicy } from './datalog/printer.js';
import { AUTHORIZER_ORIGIN, DEFAULT_RUN_LIMITS, World, trustedOrigins, type RunLimits } from './datalog/world.js';
import { toBase64 } from './encoding.js';
import { AuthorizationError, TokenError, type FailedCheck } from './errors.js';
import { Biscuit } from './token/biscuit.js';
import type { Block } from './token/block.js';
import { FORMAT_VERSION, canonicalBytes, decodeField, parseJsonObject } from './token/wire.js';

export interface AuthorizationSuccess {
  /** index of the matching allow policy */
  index: number;
  policy: string;
}

interface SnapshotWire {
  version: number;
  code: string;
  time?: number;
  token?: string;
}

export interface SnapshotOptions {
  /** keep only the authorizer code of a full snapshot */
  policiesOnly?: boolean;
}

function parseSnapshot(bytes: Uint8Array): SnapshotWire {
  const { version, code, time, token } = parseJsonObject(bytes, 'snapshot');
  if (version !== FORMAT_VERSION) {
    throw new TokenError(`Unsupported snapshot version: ${String(version)}`);
  }
  if (typeof code !== 'string') {
    throw new TokenError("Invalid snapshot: missing field 'code'");
  }
  if (time !== undefined && typeof time !== 'number') {
    throw new TokenError("Invalid snapshot: 'time' must be a number");
  }
  if (token !== undefined && typeof token !== 'string') {
    throw new TokenError("Invalid snapshot: 'token' must be a string");
  }
  return {
    version: FORMAT_VERSION,
    code,
    ...(time !== undefined ? { time } : {}),
    ...(token !== undefined ? { token } : {}),
  };
}

export class Authorizer {
  private token: Biscuit | undefined;
  private time: Date | undefined;
  private world: World | undefined;

  constructor(readonly code: AuthorizerCode = emptyAuthorizerCode()) {}

  static fromSource(source: string, params: readonly Param[] = []): Authorizer {
    return new Authorizer(bindParams(parseAuthorizer(source), params));
  }

  /**
   * Restore an authorizer from a full or policies-only snapshot. The token of
   * a full snapshot was verified when the snapshot was taken.
   */
  static fromSnapshot(bytes: Uint8Array, options: SnapshotOptions = {}): Authorizer {
    const snapshot = parseSnapshot(bytes);
    const authorizer = new Authorizer(parseAuthorizer(snapshot.code));
    if (options.policiesOnly) {
      return authorizer;
    }
    if (snapshot.time !== undefined) {
      authorizer.setTime(dateFromSeconds(snapshot.time));
    }
    if (snapshot.token !== undefined) {
      authorizer.addToken(Biscuit.fromBytes(decodeField(snapshot.token, 'snapshot token')));
    }
    return authorizer;
  }

  addToken(token: Biscuit): this {
    this.token = token;
    this.world = undefined;
    return this;
  }

  /**
   * Add a `time(<date>)` fact
   */
  setTime(date: Date): this {
    this.time = date;
    this.world = undefined;
    return this;
  }

  get currentTime(): Date | undefined {
    return this.time;
  }

  get tokenBlocks(): Block[] {
    return this.token?.blocks() ?? [];
  }

  /**
   * Run every check and the policies. Resolves to the first matching allow
   * policy; throws AuthorizationError otherwise.
   */
  authorize(limits: RunLimits = DEFAULT_RUN_LIMITS): AuthorizationSuccess {
    const start = Date.now();
    const world = this.evaluate(limits);
    const blocks = this.tokenBlocks;
    const failed: FailedCheck[] = [];

    this.code.checks.forEach((check, index) => {
      if (!this.checkPasses(world, check, AUTHORIZER_ORIGIN, this.code.scopes)) {
        failed.push({ origin: 'authorizer', index, code: printCheck(check) });
      }
    });
    for (const block of blocks) {
      block.code.checks.forEach((check, index) => {
        if (!this.checkPasses(world, check, block.index, block.code.scopes)) {
          failed.push({ origin: block.index, index, code: printCheck(check) });
        }
      });
    }

    const matched = this.code.policies.findIndex((policy) =>
      policy.queries.some((query) => world.queryMatches(query, this.trusted(AUTHORIZER_ORIGIN, query, this.code.scopes)))
    );

    if (Date.now() - start > limits.maxTimeMs) {
      throw new AuthorizationError({ type: 'run_limit', limit: 'time' });
    }

    if (matched === -1) {
      throw new AuthorizationError({ type: 'no_matching_policy', checks: failed });
    }
    const policy = this.code.policies[matched];
    if (policy.kind === 'deny') {
      throw new AuthorizationError({ type: 'denied', policy: printPolicy(policy), checks: failed });
    }
    if (failed.length > 0) {
      throw new AuthorizationError({ type: 'failed_checks', checks: failed });
    }
    return { index: matched, policy: printPolicy(policy) };
  }

  /**
   * Facts produced by a rule. By default the rule trusts the authority block
   * and the authorizer (or its own scopes); `all` trusts every block.
   */
  query(rule: Rule, options: { all?: boolean; limits?: RunLimits } = {}): Fact[] {
    const world = this.evaluate(options.limits ?? DEFAULT_RUN_LIMITS);
    const trusted = options.all
      ? new Set([AUTHORIZER_ORIGIN, ...this.tokenBlocks.map((b) => b.index)])
      : this.trusted(AUTHORIZER_ORIGIN, rule, this.code.scopes);
    return world.queryRule(rule, trusted);
  }

  /**
   * Authorizer code, time and token
   */
  snapshot(): Uint8Array {
    const wire: SnapshotWire = {
      version: FORMAT_VERSION,
      code: printAuthorizer(this.code),
      ...(this.time ? { time: secondsFromDate(this.time) } : {}),
      ...(this.token ? { token: toBase64(this.token.toBytes()) } : {}),
    };
    return canonicalBytes(wire);
  }

  /**
   * Authorizer code only, reusable against other tokens
   */
  policiesSnapshot(): Uint8Array {
    const wire: SnapshotWire = { version: FORMAT_VERSION, code: printAuthorizer(this.code) };
    return canonicalBytes(wire);
  }

  private externalKeys(): Map<string, number[]> {
    const byKey = new Map<string, number[]>();
    for (const block of this.tokenBlocks) {
      if (block.externalKey) {
        const key = block.externalKey.toString();
        byKey.set(key, [...(byKey.get(key) ?? []), block.index]);
      }
    }
    return byKey;
  }

  private trusted(origin: number, query: Query, defaultScopes: readonly Scope[]): Set<number> {
    const scopes = query.scopes.length > 0 ? query.scopes : defaultScopes;
    return trustedOrigins(origin, scopes, this.tokenBlocks.length, this.externalKeys());
  }

  private checkPasses(world: World, check: Check, origin: number, defaultScopes: readonly Scope[]): boolean {
    return check.queries.some((query) =>
      world.queryMatches(query, this.trusted(origin, query, defaultScopes), check.kind)
    );
  }

  private evaluate(limits: RunLimits): World {
    if (this.world) {
      return this.world;
    }

    const world = new World();
    for (const block of this.tokenBlocks) {
      for (const fact of block.code.facts) world.addFact(fact, block.index);
      for (const rule of block.code.rules) {
        world.addRule(rule, block.index, this.trusted(block.index, rule, block.code.scopes));
      }
    }
    for (const fact of this.code.facts) world.addFact(fact, AUTHORIZER_ORIGIN);
    if (this.time) {
      world.addFact(
        { name: 'time', terms: [{ type: 'date', value: secondsFromDate(this.time) }] },
        AUTHORIZER_ORIGIN
      );
    }
    for (const rule of this.code.rules) {
      world.addRule(rule, AUTHORIZER_ORIGIN, this.trusted(AUTHORIZER_ORIGIN, rule, this.code.scopes));
    }

    world.run(limits);
    this.world = world;
    return world;
  }
}
