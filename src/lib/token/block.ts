/**
 * Block builders and decoded blocks
 */

import type { BlockCode } from '../datalog/ast.js';
import { secondsFromDate } from '../datalog/ast.js';
import type { Param } from '../datalog/params.js';
import { bindParams } from '../datalog/params.js';
import { parseBlock } from '../datalog/parser.js';
import { printBlock } from '../datalog/printer.js';
import { TokenError } from '../errors.js';
import type { PublicKey } from '../keys.js';
import { FORMAT_VERSION, canonicalBytes, type BlockPayload } from './wire.js';

/**
 * Accumulates the contents of one block: Datalog code with bound params, an
 * optional context string and expiration checks
 */
export class BlockBuilder {
  private code: BlockCode = { facts: [], rules: [], checks: [], scopes: [] };
  private context: string | undefined;

  /**
   * Parse Datalog source and bind its `{name}` params. Every param must be
   * used by the source.
   */
  static fromSource<T extends BlockBuilder>(this: new () => T, source: string, params: readonly Param[] = []): T {
    return new this().addCode(source, params);
  }

  addCode(source: string, params: readonly Param[] = []): this {
    const parsed = parseBlock(source);
    const bound = bindParams({ ...parsed, policies: [] }, params);
    this.code = {
      facts: [...this.code.facts, ...bound.facts],
      rules: [...this.code.rules, ...bound.rules],
      checks: [...this.code.checks, ...bound.checks],
      scopes: [...this.code.scopes, ...bound.scopes],
    };
    return this;
  }

  setContext(context: string): this {
    this.context = context;
    return this;
  }

  /**
   * Attach `check if time($time), $time <= <expiration>`
   */
  checkExpirationDate(expiration: Date): this {
    this.code.checks.push({
      kind: 'if',
      queries: [
        {
          body: [{ name: 'time', terms: [{ type: 'variable', name: 'time' }] }],
          expressions: [
            {
              type: 'compare',
              op: '<=',
              left: { type: 'variable', name: 'time' },
              right: { type: 'date', value: secondsFromDate(expiration) },
            },
          ],
          scopes: [],
        },
      ],
    });
    return this;
  }

  /**
   * Signed payload bytes of the block
   */
  build(): Uint8Array {
    const payload: BlockPayload = {
      version: FORMAT_VERSION,
      code: printBlock(this.code),
      ...(this.context !== undefined ? { context: this.context } : {}),
    };
    return canonicalBytes(payload);
  }
}

/**
 * Builder for the authority block, which may also carry a root key id hint
 */
export class AuthorityBuilder extends BlockBuilder {
  private keyId: number | undefined;

  setRootKeyId(id: number): this {
    if (!Number.isInteger(id) || id < 0) {
      throw new TokenError(`Invalid root key id: ${id}`);
    }
    this.keyId = id;
    return this;
  }

  get rootKeyId(): number | undefined {
    return this.keyId;
  }
}

/**
 * A decoded block of a token
 */
export interface Block {
  index: number;
  code: BlockCode;
  /** Datalog source as stored in the token */
  source: string;
  context?: string;
  /** Key of the third party that signed the block, if any */
  externalKey?: PublicKey;
  revocationId: string;
}
