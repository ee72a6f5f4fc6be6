/**
 * Command line declarations. Each action maps its flags to input sources and
 * hands a command definition to the pipeline.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { attenuateCommand } from './lib/commands/attenuate.js';
import { generateCommand } from './lib/commands/generate.js';
import { inspectCommand, type SnapshotDumpOptions } from './lib/commands/inspect.js';
import { inspectSnapshotCommand } from './lib/commands/inspect-snapshot.js';
import { keypairCommand, type KeyOutput } from './lib/commands/keypair.js';
import { sealCommand } from './lib/commands/seal.js';
import {
  appendThirdPartyBlockCommand,
  generateRequestCommand,
  generateThirdPartyBlockCommand,
} from './lib/commands/third-party.js';
import type { Rule } from './lib/datalog/ast.js';
import { parseParam, type Param } from './lib/datalog/params.js';
import { parseRule } from './lib/datalog/parser.js';
import { DEFAULT_RUN_LIMITS, type RunLimits } from './lib/datalog/world.js';
import { UsageError, errorMessage } from './lib/errors.js';
import {
  KEY_FORMATS,
  authoritySource,
  authorizerSource,
  blockContentsSource,
  blockSource,
  keySource,
  privateKeySource,
  tokenSource,
  type KeyFormat,
} from './lib/input/sources.js';
import { ALGORITHMS, type Algorithm } from './lib/keys.js';
import { runCommand, type CommandContext, type CommandDefinition } from './lib/pipeline.js';
import { parseDuration, parseTtl, type Ttl } from './lib/time.js';

export interface GlobalOptions {
  verbose: boolean;
}

// ============================================================================
// ARGUMENT PARSERS
// ============================================================================

function parseWith<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(errorMessage(error));
    }
  };
}

function collectParam(value: string, previous: Param[]): Param[] {
  return [...previous, parseWith(parseParam)(value)];
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

const ttlOption = () =>
  new Option(
    '--add-ttl <TTL>',
    'add a TTL check to the block: an expiration timestamp or a duration (examples: 2025-04-01T00:00:00Z, 1d, 15m)'
  ).argParser(parseWith(parseTtl));

const paramOption = () =>
  new Option(
    '--param <key[:type]=value>',
    'value for a datalog parameter; type is one of pubkey, string, integer, date, bytes, bool (default string)'
  )
    .argParser(collectParam)
    .default([]);

function addPrivateKeyOptions(command: Command): Command {
  return command
    .addOption(new Option('--private-key <PRIVATE_KEY>', 'the private key used to sign the block').conflicts('privateKeyFile'))
    .addOption(new Option('--private-key-file <PRIVATE_KEY_FILE>', 'the private key used to sign the block (or - for stdin)'))
    .addOption(
      new Option('--private-key-format <format>', 'input format for the private key; raw only from a file or stdin')
        .choices(KEY_FORMATS)
        .default('hex')
    )
    .addOption(
      new Option('--private-key-algorithm <algorithm>', 'private key algorithm, when reading raw bytes').choices(ALGORITHMS)
    );
}

function addBlockOptions(command: Command): Command {
  return command
    .addOption(new Option('--block <DATALOG>', 'the block to append; without --block or --block-file, $EDITOR is opened'))
    .addOption(new Option('--block-file <DATALOG_FILE>', 'read the block from a file (or - for stdin)').conflicts('block'))
    .option('--context <context>', 'context string attached to the new block')
    .addOption(ttlOption())
    .addOption(paramOption());
}

function addRunLimitOptions(command: Command): Command {
  return command
    .addOption(new Option('--max-facts <count>', 'maximum number of facts generated before aborting').argParser(parseCount))
    .addOption(new Option('--max-iterations <count>', 'maximum number of iterations before aborting').argParser(parseCount))
    .addOption(
      new Option('--max-time <DURATION>', 'maximum evaluation duration before aborting (examples: 100ms, 1s)').argParser(
        parseWith(parseDuration)
      )
    );
}

function addQueryOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--query <DATALOG_RULE>', 'query the authorizer after evaluation').argParser(parseWith(parseRule))
    )
    .option('--query-all', 'query facts from all blocks, including untrusted ones');
}

// ============================================================================
// FLAG RECORDS
// ============================================================================

interface PrivateKeyFlags {
  privateKey?: string;
  privateKeyFile?: string;
  privateKeyFormat: KeyFormat;
  privateKeyAlgorithm?: Algorithm;
}

interface BlockFlags {
  block?: string;
  blockFile?: string;
  context?: string;
  addTtl?: Ttl;
  param: Param[];
}

interface RunLimitFlags {
  maxFacts?: number;
  maxIterations?: number;
  maxTime?: number;
}

interface QueryFlags {
  query?: Rule;
  queryAll?: boolean;
}

function signingKey(flags: PrivateKeyFlags) {
  return privateKeySource({
    key: flags.privateKey,
    file: flags.privateKeyFile,
    format: flags.privateKeyFormat,
    algorithm: flags.privateKeyAlgorithm,
  });
}

function runLimits(flags: RunLimitFlags): RunLimits {
  return {
    maxFacts: flags.maxFacts ?? DEFAULT_RUN_LIMITS.maxFacts,
    maxIterations: flags.maxIterations ?? DEFAULT_RUN_LIMITS.maxIterations,
    maxTimeMs: flags.maxTime ?? DEFAULT_RUN_LIMITS.maxTimeMs,
  };
}

function queryOptions(flags: QueryFlags): { query?: Rule; queryAll: boolean } {
  if (flags.queryAll && !flags.query) {
    throw new UsageError('--query-all requires --query');
  }
  return { ...(flags.query ? { query: flags.query } : {}), queryAll: flags.queryAll ?? false };
}

function snapshotDump(path: string | undefined, raw: boolean | undefined, flag: string): SnapshotDumpOptions | undefined {
  if (path === undefined) {
    if (raw) throw new UsageError(`${flag} requires a snapshot path`);
    return undefined;
  }
  return { path, raw: raw ?? false };
}

// ============================================================================
// PROGRAM
// ============================================================================

/**
 * Build the `biscuit` program. `createContext` supplies stdin, stdout, the
 * editor and the clock for every command run.
 */
export function createProgram(version: string, createContext: (options: GlobalOptions) => CommandContext): Command {
  const program = new Command();

  program
    .name('biscuit')
    .description('Create, attenuate, inspect and seal biscuit tokens, inspect snapshots and manage key pairs')
    .version(version)
    .option('--verbose', 'print each step to stderr');

  function run<Resolved, Result>(definition: CommandDefinition<Resolved, Result>): void {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    runCommand(definition, createContext({ verbose: verbose ?? false }));
  }

  // ==========================================================================
  // KEYPAIR
  // ==========================================================================

  program
    .command('keypair')
    .description('Create and manipulate key pairs')
    .addOption(
      new Option('--from-private-key <PRIVATE_KEY>', 'derive the key pair from this private key').conflicts('fromFile')
    )
    .addOption(new Option('--from-file <PRIVATE_KEY_FILE>', 'derive the key pair from a private key file (or - for stdin)'))
    .addOption(new Option('--from-format <format>', 'input format for the private key').choices(KEY_FORMATS).default('hex'))
    .addOption(new Option('--from-algorithm <algorithm>', 'private key algorithm, when reading raw bytes').choices(ALGORITHMS))
    .addOption(
      new Option('--key-algorithm <algorithm>', 'algorithm of a generated key pair')
        .choices(ALGORITHMS)
        .default('ed25519')
        .conflicts(['fromPrivateKey', 'fromFile'])
    )
    .addOption(new Option('--key-output-format <format>', 'output format of the keys').choices(KEY_FORMATS).default('hex'))
    .addOption(new Option('--only-public-key', 'only output the public key').conflicts('onlyPrivateKey'))
    .option('--only-private-key', 'only output the private key')
    .action(
      (flags: {
        fromPrivateKey?: string;
        fromFile?: string;
        fromFormat: KeyFormat;
        fromAlgorithm?: Algorithm;
        keyAlgorithm: Algorithm;
        keyOutputFormat: KeyFormat;
        onlyPublicKey?: boolean;
        onlyPrivateKey?: boolean;
      }) => {
        const output: KeyOutput = flags.onlyPrivateKey ? 'private' : flags.onlyPublicKey ? 'public' : 'both';
        const from = keySource({
          key: flags.fromPrivateKey,
          file: flags.fromFile,
          format: flags.fromFormat,
          algorithm: flags.fromAlgorithm,
        });
        run(
          keypairCommand({
            ...(from ? { from } : {}),
            algorithm: flags.keyAlgorithm,
            output,
            format: flags.keyOutputFormat,
          })
        );
      }
    );

  // ==========================================================================
  // GENERATE
  // ==========================================================================

  addPrivateKeyOptions(
    program
      .command('generate')
      .description('Generate a biscuit from a private key and an authority block')
      .argument('[DATALOG_FILE]', 'read the authority block from a file (or - for stdin); without it, $EDITOR is opened')
      .addOption(new Option('--root-key-id <id>', 'root key id, as a hint for public key selection').argParser(parseCount))
      .addOption(paramOption())
      .option('--raw', 'output the biscuit raw bytes, with no base64 encoding')
      .option('--context <context>', 'context string attached to the authority block')
      .addOption(ttlOption())
  ).action(
    (
      file: string | undefined,
      flags: PrivateKeyFlags & { rootKeyId?: number; param: Param[]; raw?: boolean; context?: string; addTtl?: Ttl }
    ) => {
      run(
        generateCommand({
          authority: authoritySource(file),
          privateKey: signingKey(flags),
          params: flags.param,
          ...(flags.context !== undefined ? { context: flags.context } : {}),
          ...(flags.addTtl ? { ttl: flags.addTtl } : {}),
          ...(flags.rootKeyId !== undefined ? { rootKeyId: flags.rootKeyId } : {}),
          raw: flags.raw ?? false,
        })
      );
    }
  );

  // ==========================================================================
  // ATTENUATE
  // ==========================================================================

  addBlockOptions(
    program
      .command('attenuate')
      .description('Attenuate an existing biscuit by adding a new block')
      .argument('<BISCUIT_FILE>', 'read the biscuit from a file (or - for stdin)')
      .option('--raw-input', 'read the biscuit raw bytes, with no base64 parsing')
      .option('--raw-output', 'output the biscuit raw bytes, with no base64 encoding')
  ).action((file: string, flags: BlockFlags & { rawInput?: boolean; rawOutput?: boolean }) => {
    run(
      attenuateCommand({
        token: tokenSource(file, flags.rawInput ?? false),
        block: blockSource(flags),
        params: flags.param,
        ...(flags.context !== undefined ? { context: flags.context } : {}),
        ...(flags.addTtl ? { ttl: flags.addTtl } : {}),
        raw: flags.rawOutput ?? false,
      })
    );
  });

  // ==========================================================================
  // INSPECT
  // ==========================================================================

  addQueryOptions(
    addRunLimitOptions(
      program
        .command('inspect')
        .description('Inspect a biscuit, optionally check its public key and run authorization')
        .argument('<BISCUIT_FILE>', 'read the biscuit from a file (or - for stdin)')
        .option('--json', 'output the results in a machine-readable format')
        .option('--raw-input', 'read the biscuit raw bytes, with no base64 parsing')
        .addOption(new Option('--public-key <PUBLIC_KEY>', 'check the biscuit public key').conflicts('publicKeyFile'))
        .addOption(new Option('--public-key-file <PUBLIC_KEY_FILE>', 'check the biscuit public key, read from a file'))
        .addOption(
          new Option('--public-key-format <format>', 'input format for the public key; raw only from a file or stdin')
            .choices(KEY_FORMATS)
            .default('hex')
        )
        .addOption(
          new Option('--public-key-algorithm <algorithm>', 'public key algorithm, when reading raw bytes').choices(ALGORITHMS)
        )
    )
  )
    .addOption(
      new Option('--authorize-interactive', 'open $EDITOR to provide an authorizer').conflicts([
        'authorizeWith',
        'authorizeWithFile',
        'authorizeWithSnapshot',
        'authorizeWithSnapshotFile',
      ])
    )
    .addOption(
      new Option('--authorize-with-file <DATALOG_FILE>', 'authorize the biscuit with the authorizer in a file').conflicts([
        'authorizeWith',
        'authorizeWithSnapshot',
        'authorizeWithSnapshotFile',
      ])
    )
    .addOption(
      new Option('--authorize-with <DATALOG>', 'authorize the biscuit with the provided authorizer').conflicts([
        'authorizeWithSnapshot',
        'authorizeWithSnapshotFile',
      ])
    )
    .addOption(
      new Option('--authorize-with-snapshot <SNAPSHOT>', 'authorize the biscuit with a base64 policies snapshot').conflicts(
        'authorizeWithSnapshotFile'
      )
    )
    .addOption(new Option('--authorize-with-snapshot-file <SNAPSHOT_FILE>', 'authorize the biscuit with a policies snapshot file'))
    .option('--authorize-with-raw-snapshot-file', 'read the policies snapshot file as raw bytes')
    .option('--include-time', 'include the current time in the authorizer facts')
    .addOption(paramOption())
    .option('--dump-snapshot-to <SNAPSHOT_FILE>', 'save the authorizer snapshot to a file')
    .option('--dump-raw-snapshot', 'write the snapshot raw bytes, with no base64 encoding')
    .option('--dump-policies-snapshot-to <SNAPSHOT_FILE>', 'save a policies snapshot to a file')
    .option('--dump-raw-policies-snapshot', 'write the policies snapshot raw bytes, with no base64 encoding')
    .action(
      (
        file: string,
        flags: RunLimitFlags &
          QueryFlags & {
            json?: boolean;
            rawInput?: boolean;
            publicKey?: string;
            publicKeyFile?: string;
            publicKeyFormat: KeyFormat;
            publicKeyAlgorithm?: Algorithm;
            authorizeInteractive?: boolean;
            authorizeWithFile?: string;
            authorizeWith?: string;
            authorizeWithSnapshot?: string;
            authorizeWithSnapshotFile?: string;
            authorizeWithRawSnapshotFile?: boolean;
            includeTime?: boolean;
            param: Param[];
            dumpSnapshotTo?: string;
            dumpRawSnapshot?: boolean;
            dumpPoliciesSnapshotTo?: string;
            dumpRawPoliciesSnapshot?: boolean;
          }
      ) => {
        const publicKey = keySource({
          key: flags.publicKey,
          file: flags.publicKeyFile,
          format: flags.publicKeyFormat,
          algorithm: flags.publicKeyAlgorithm,
        });
        const authorizer = authorizerSource({
          authorizeWith: flags.authorizeWith,
          authorizeWithFile: flags.authorizeWithFile,
          authorizeInteractive: flags.authorizeInteractive ?? false,
          authorizeWithSnapshot: flags.authorizeWithSnapshot,
          authorizeWithSnapshotFile: flags.authorizeWithSnapshotFile,
          authorizeWithRawSnapshotFile: flags.authorizeWithRawSnapshotFile ?? false,
        });
        const dumpSnapshot = snapshotDump(flags.dumpSnapshotTo, flags.dumpRawSnapshot, '--dump-raw-snapshot');
        const dumpPoliciesSnapshot = snapshotDump(
          flags.dumpPoliciesSnapshotTo,
          flags.dumpRawPoliciesSnapshot,
          '--dump-raw-policies-snapshot'
        );

        run(
          inspectCommand({
            token: tokenSource(file, flags.rawInput ?? false),
            ...(publicKey ? { publicKey } : {}),
            ...(authorizer ? { authorizer } : {}),
            includeTime: flags.includeTime ?? false,
            params: flags.param,
            limits: runLimits(flags),
            ...queryOptions(flags),
            ...(dumpSnapshot ? { dumpSnapshot } : {}),
            ...(dumpPoliciesSnapshot ? { dumpPoliciesSnapshot } : {}),
            json: flags.json ?? false,
          })
        );
      }
    );

  // ==========================================================================
  // INSPECT-SNAPSHOT
  // ==========================================================================

  addQueryOptions(
    addRunLimitOptions(
      program
        .command('inspect-snapshot')
        .description('Inspect a snapshot, optionally query it')
        .argument('<SNAPSHOT_FILE>', 'read the snapshot from a file (or - for stdin)')
        .option('--json', 'output the results in a machine-readable format')
        .option('--raw-input', 'read the snapshot raw bytes, with no base64 parsing')
    )
  )
    .addOption(paramOption())
    .action((file: string, flags: RunLimitFlags & QueryFlags & { json?: boolean; rawInput?: boolean; param: Param[] }) => {
      run(
        inspectSnapshotCommand({
          snapshot: tokenSource(file, flags.rawInput ?? false),
          params: flags.param,
          limits: runLimits(flags),
          ...queryOptions(flags),
          json: flags.json ?? false,
        })
      );
    });

  // ==========================================================================
  // THIRD-PARTY BLOCKS
  // ==========================================================================

  program
    .command('generate-third-party-block-request')
    .description('Generate a third-party block request from an existing biscuit')
    .argument('<BISCUIT_FILE>', 'read the biscuit from a file (or - for stdin)')
    .option('--raw-input', 'read the biscuit raw bytes, with no base64 parsing')
    .option('--raw-output', 'output the request raw bytes, with no base64 encoding')
    .action((file: string, flags: { rawInput?: boolean; rawOutput?: boolean }) => {
      run(generateRequestCommand({ token: tokenSource(file, flags.rawInput ?? false), raw: flags.rawOutput ?? false }));
    });

  addBlockOptions(
    addPrivateKeyOptions(
      program
        .command('generate-third-party-block')
        .description('Generate a third-party block from a third-party block request')
        .argument('<REQUEST_FILE>', 'read the request from a file (or - for stdin)')
        .option('--raw-input', 'read the request raw bytes, with no base64 parsing')
        .option('--raw-output', 'output the block raw bytes, with no base64 encoding')
    )
  ).action((file: string, flags: PrivateKeyFlags & BlockFlags & { rawInput?: boolean; rawOutput?: boolean }) => {
    run(
      generateThirdPartyBlockCommand({
        request: tokenSource(file, flags.rawInput ?? false),
        block: blockSource(flags),
        privateKey: signingKey(flags),
        params: flags.param,
        ...(flags.context !== undefined ? { context: flags.context } : {}),
        ...(flags.addTtl ? { ttl: flags.addTtl } : {}),
        raw: flags.rawOutput ?? false,
      })
    );
  });

  program
    .command('append-third-party-block')
    .description('Append a third-party block to a biscuit')
    .argument('<BISCUIT_FILE>', 'read the biscuit from a file (or - for stdin)')
    .option('--raw-input', 'read the biscuit raw bytes, with no base64 parsing')
    .option('--raw-output', 'output the biscuit raw bytes, with no base64 encoding')
    .option('--block-contents <BLOCK>', 'the third-party block to append, base64 encoded')
    .addOption(
      new Option('--block-contents-file <BLOCK_FILE>', 'read the third-party block from a file (or - for stdin)').conflicts(
        'blockContents'
      )
    )
    .option('--raw-block-contents', 'read the third-party block raw bytes, with no base64 parsing')
    .action(
      (
        file: string,
        flags: {
          rawInput?: boolean;
          rawOutput?: boolean;
          blockContents?: string;
          blockContentsFile?: string;
          rawBlockContents?: boolean;
        }
      ) => {
        run(
          appendThirdPartyBlockCommand({
            token: tokenSource(file, flags.rawInput ?? false),
            block: blockContentsSource({
              blockContents: flags.blockContents,
              blockContentsFile: flags.blockContentsFile,
              rawBlockContents: flags.rawBlockContents ?? false,
            }),
            raw: flags.rawOutput ?? false,
          })
        );
      }
    );

  // ==========================================================================
  // SEAL
  // ==========================================================================

  program
    .command('seal')
    .description('Seal a token, preventing further attenuation')
    .argument('<BISCUIT_FILE>', 'read the biscuit from a file (or - for stdin)')
    .option('--raw-input', 'read the biscuit raw bytes, with no base64 parsing')
    .option('--raw-output', 'output the biscuit raw bytes, with no base64 encoding')
    .action((file: string, flags: { rawInput?: boolean; rawOutput?: boolean }) => {
      run(sealCommand({ token: tokenSource(file, flags.rawInput ?? false), raw: flags.rawOutput ?? false }));
    });

  return program;
}
