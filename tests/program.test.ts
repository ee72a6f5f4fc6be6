/**
 * Tests for the command line declarations and the logger
 */

import { describe, it, expect } from 'vitest';
import { CommanderError, type Command } from 'commander';

import { MultipleStdinConsumers, UsageError } from '../src/lib/errors.js';
import { createLogger } from '../src/lib/log.js';
import { Biscuit } from '../src/lib/token/biscuit.js';
import { PublicKey } from '../src/lib/keys.js';
import { createProgram, type GlobalOptions } from '../src/program.js';
import { testContext, testKeys, type ContextOptions, type TestContext } from './support.js';

interface Invocation {
  test: TestContext;
  globals: GlobalOptions[];
}

function quiet(command: Command): void {
  command.exitOverride().configureOutput({ writeOut() {}, writeErr() {} });
}

function invoke(args: string[], options: ContextOptions = {}): Invocation {
  const test = testContext(options);
  const globals: GlobalOptions[] = [];
  const program = createProgram('0.0.0', (global) => {
    globals.push(global);
    return test.context;
  });
  quiet(program);
  program.commands.forEach(quiet);

  program.parse(args, { from: 'user' });
  return { test, globals };
}

function commanderCode(args: string[]): string {
  try {
    invoke(args);
  } catch (error) {
    if (error instanceof CommanderError) return error.code;
    throw error;
  }
  throw new Error('the command line was accepted');
}

// ============================================================================
// COMMAND LINE TESTS
// ============================================================================

describe('command line', () => {
  it('should derive a public key from a private key', () => {
    const { test } = invoke(['keypair', '--from-private-key', testKeys.privateKey, '--only-public-key']);

    expect(test.out.text()).toBe(`ed25519/${testKeys.publicKey}\n`);
  });

  it('should generate a token from stdin and inspect it from a file', () => {
    const generated = invoke(['generate', '--private-key', testKeys.privateKey, '--context', 'cli', '-'], {
      stdin: 'user("alice");',
    });
    const token = generated.test.out.text();

    expect(Biscuit.fromBase64(token, PublicKey.fromString(testKeys.publicKey)).blocks()[0].context).toBe('cli');

    const inspected = invoke(
      ['inspect', 'token.bc', '--public-key', testKeys.publicKey, '--authorize-with', 'allow if user("alice");'],
      { files: { 'token.bc': token } }
    );
    expect(inspected.test.out.text()).toContain('\nAuthorization: ALLOWED ✓ (policy #0: allow if user("alice"))\n');
  });

  it('should pass --verbose to the context', () => {
    const { globals, test } = invoke(['--verbose', 'keypair', '--only-private-key']);

    expect(globals).toEqual([{ verbose: true }]);
    expect(test.out.text()).toMatch(/^ed25519-private\/[0-9a-f]{64}\n$/);
  });

  it('should reject conflicting options', () => {
    expect(commanderCode(['keypair', '--only-public-key', '--only-private-key'])).toBe('commander.conflictingOption');
    expect(commanderCode(['keypair', '--from-private-key', 'aa', '--from-file', 'key'])).toBe(
      'commander.conflictingOption'
    );
  });

  it('should reject malformed option values', () => {
    expect(commanderCode(['attenuate', 'token.bc', '--block', 'check if true;', '--add-ttl', 'soon'])).toBe(
      'commander.invalidArgument'
    );
    expect(commanderCode(['generate', '-', '--private-key', 'aa', '--add-ttl', '3000000d'])).toBe(
      'commander.invalidArgument'
    );
    expect(commanderCode(['inspect', 'token.bc', '--max-facts', 'many'])).toBe('commander.invalidArgument');
    expect(commanderCode(['keypair', '--key-output-format', 'der'])).toBe('commander.invalidArgument');
  });

  it('should reject --query-all without --query', () => {
    expect(() => invoke(['inspect-snapshot', 'snapshot', '--query-all'])).toThrow(
      new UsageError('--query-all requires --query')
    );
  });

  it('should reject a raw dump without its path', () => {
    expect(() => invoke(['inspect', 'token.bc', '--dump-raw-policies-snapshot'])).toThrow(
      '--dump-raw-policies-snapshot requires a snapshot path'
    );
  });

  it('should reject raw key literals', () => {
    expect(() => invoke(['inspect', 'token.bc', '--public-key', 'aa', '--public-key-format', 'raw'])).toThrow(UsageError);
  });

  it('should reject two inputs on stdin', () => {
    expect(() => invoke(['generate', '-', '--private-key-file', '-'])).toThrow(MultipleStdinConsumers);
  });
});

// ============================================================================
// LOGGER TESTS
// ============================================================================

describe('logger', () => {
  it('should only print debug lines when verbose', () => {
    const lines: string[] = [];
    const quietLog = createLogger({ write: (line) => lines.push(line) });
    const verboseLog = createLogger({ verbose: true, write: (line) => lines.push(line) });

    quietLog.debug('hidden');
    verboseLog.debug('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('debug: shown');
  });

  it('should always print warnings', () => {
    const lines: string[] = [];
    createLogger({ write: (line) => lines.push(line) }).warn('params ignored');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/Warning:.* params ignored$/);
  });
});
