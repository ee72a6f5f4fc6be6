/**
 * Error taxonomy for the biscuit command line tool
 *
 * Every user-facing failure is a CliError. Token, key, Datalog and authorizer
 * modules throw their own error classes; the command pipeline wraps those as
 * DelegateFailure so the binary reports a single family of errors.
 */

export type CliErrorKind =
  | 'IoFailure'
  | 'MalformedEncoding'
  | 'InvalidText'
  | 'MultipleStdinConsumers'
  | 'EditorFailure'
  | 'DelegateFailure'
  | 'UsageError';

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export abstract class CliError extends Error {
  abstract readonly kind: CliErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A file or stream could not be read, or a snapshot file written
 */
export class IoFailure extends CliError {
  readonly kind = 'IoFailure' as const;

  constructor(
    readonly target: string,
    cause: unknown,
    readonly operation: 'read' | 'write' = 'read'
  ) {
    super(`Could not ${operation} ${target}: ${errorMessage(cause)}`, { cause });
  }
}

export type Encoding = 'hex' | 'base64' | 'pem' | 'raw';

/**
 * A payload was read but could not be decoded
 */
export class MalformedEncoding extends CliError {
  readonly kind = 'MalformedEncoding' as const;

  constructor(
    readonly payload: string,
    readonly encoding: Encoding,
    cause: unknown
  ) {
    super(`Malformed ${encoding} ${payload}: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * Text input that is not valid UTF-8
 */
export class InvalidText extends CliError {
  readonly kind = 'InvalidText' as const;

  constructor(
    readonly target: string,
    cause?: unknown
  ) {
    super(`${target} is not valid UTF-8 text`, { cause });
  }
}

/**
 * Two inputs of the same invocation both want to read standard input
 */
export class MultipleStdinConsumers extends CliError {
  readonly kind = 'MultipleStdinConsumers' as const;

  constructor(readonly inputs: readonly [string, string]) {
    super(
      `Standard input can only be used by one input, but both ${inputs[0]} and ${inputs[1]} need it`
    );
  }
}

export class EditorFailure extends CliError {
  readonly kind = 'EditorFailure' as const;

  constructor(message: string, cause?: unknown) {
    super(`Editor failed: ${message}`, { cause });
  }
}

/**
 * Wraps a failure raised by the key, token, Datalog or authorizer modules
 */
export class DelegateFailure extends CliError {
  readonly kind = 'DelegateFailure' as const;

  constructor(
    readonly step: string,
    cause: unknown
  ) {
    super(`${step}: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * An option combination the flag parser cannot reject on its own
 */
export class UsageError extends CliError {
  readonly kind = 'UsageError' as const;
}

/**
 * An option combination that the flag parser already forbids reached the
 * input model: the option declarations and the builders are out of sync.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = 'InternalError';
  }
}

// Errors raised by the delegates

export class KeyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KeyError';
  }
}

export class DatalogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DatalogError';
  }
}

export class TokenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TokenError';
  }
}

export type AuthorizationFailure =
  | { type: 'failed_checks'; checks: FailedCheck[] }
  | { type: 'denied'; policy: string; checks: FailedCheck[] }
  | { type: 'no_matching_policy'; checks: FailedCheck[] }
  | { type: 'run_limit'; limit: 'facts' | 'iterations' | 'time' };

export interface FailedCheck {
  origin: 'authorizer' | number;
  index: number;
  code: string;
}

function describeFailure(failure: AuthorizationFailure): string {
  switch (failure.type) {
    case 'run_limit':
      return `run limit exceeded (too many ${failure.limit === 'time' ? 'milliseconds' : failure.limit})`;
    case 'denied':
      return `matched deny policy: ${failure.policy}`;
    case 'no_matching_policy':
      return 'no policy matched';
    case 'failed_checks':
      return `${failure.checks.length} check(s) failed`;
  }
}

export class AuthorizationError extends Error {
  constructor(readonly failure: AuthorizationFailure) {
    const checks = failure.type === 'run_limit' ? [] : failure.checks;
    const lines = checks.map(
      (c) =>
        `  ${c.origin === 'authorizer' ? 'authorizer' : `block ${c.origin}`} check #${c.index}: ${c.code}`
    );
    super(['Authorization failed: ' + describeFailure(failure), ...lines].join('\n'));
    this.name = 'AuthorizationError';
  }
}
