/**
 * biscuit-tools
 * Create, attenuate, seal, inspect and exchange biscuit authorization tokens
 *
 * Ed25519 and P-256 signed chains of Datalog blocks
 */

// Keys
export { ALGORITHMS, KeyPair, PrivateKey, PublicKey, isAlgorithm } from './keys.js';
export type { Algorithm } from './keys.js';

// Tokens
export { Biscuit } from './token/biscuit.js';
export { AuthorityBuilder, BlockBuilder } from './token/block.js';
export type { Block } from './token/block.js';
export { ThirdPartyBlock, ThirdPartyRequest } from './token/third-party.js';

// Authorization
export { Authorizer } from './authorizer.js';
export type { AuthorizationSuccess, SnapshotOptions } from './authorizer.js';
export { DEFAULT_RUN_LIMITS } from './datalog/world.js';
export type { RunLimits } from './datalog/world.js';

// Datalog
export { parseAuthorizer, parseBlock, parseRule } from './datalog/parser.js';
export { printAuthorizer, printBlock, printRule } from './datalog/printer.js';
export { ParamBinder, bindParams, parseParam } from './datalog/params.js';
export type { Param, ParamType, ParamValue } from './datalog/params.js';
export type { AuthorizerCode, BlockCode, Fact, Rule, Term } from './datalog/ast.js';

// Time
export { parseDuration, parseRfc3339, parseTtl, ttlToDate } from './time.js';
export type { Ttl } from './time.js';

// Errors
export {
  AuthorizationError,
  CliError,
  DatalogError,
  DelegateFailure,
  EditorFailure,
  InternalError,
  InvalidText,
  IoFailure,
  KeyError,
  MalformedEncoding,
  MultipleStdinConsumers,
  TokenError,
  UsageError,
} from './errors.js';
export type { AuthorizationFailure, CliErrorKind, FailedCheck } from './errors.js';

// Command pipeline
export { runCommand } from './pipeline.js';
export type { CommandContext, CommandDefinition } from './pipeline.js';
