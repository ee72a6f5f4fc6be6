/**
 * Tests for the commands, run through the pipeline with in-memory I/O
 */

import { describe, it, expect } from 'vitest';

import { Authorizer } from '../src/lib/authorizer.js';
import { attenuateCommand } from '../src/lib/commands/attenuate.js';
import { generateCommand, type GenerateOptions } from '../src/lib/commands/generate.js';
import { inspectCommand, type InspectOptions } from '../src/lib/commands/inspect.js';
import { inspectSnapshotCommand } from '../src/lib/commands/inspect-snapshot.js';
import { keypairCommand } from '../src/lib/commands/keypair.js';
import { sealCommand } from '../src/lib/commands/seal.js';
import {
  appendThirdPartyBlockCommand,
  generateRequestCommand,
  generateThirdPartyBlockCommand,
} from '../src/lib/commands/third-party.js';
import { parseParam } from '../src/lib/datalog/params.js';
import { parseRule } from '../src/lib/datalog/parser.js';
import { DEFAULT_RUN_LIMITS } from '../src/lib/datalog/world.js';
import { fromBase64, hexToBytes } from '../src/lib/encoding.js';
import { DelegateFailure, IoFailure, MultipleStdinConsumers, UsageError } from '../src/lib/errors.js';
import { KeyPair, PrivateKey } from '../src/lib/keys.js';
import { runCommand, type CommandDefinition } from '../src/lib/pipeline.js';
import { MAX_DATE } from '../src/lib/time.js';
import { Biscuit } from '../src/lib/token/biscuit.js';
import { testContext, testKeys, type ContextOptions, type TestContext } from './support.js';

const RULE = '━'.repeat(41);
const PRIVATE_KEY = { type: 'hex', text: testKeys.privateKey } as const;
const PUBLIC_KEY = { type: 'hex', text: testKeys.publicKey } as const;
const root = KeyPair.fromPrivateKey(PrivateKey.fromString(testKeys.privateKey));

function run<R, T>(definition: CommandDefinition<R, T>, options: ContextOptions = {}): TestContext {
  const test = testContext(options);
  runCommand(definition, test.context);
  return test;
}

function generate(authority = 'user("alice");', extra: Partial<GenerateOptions> = {}): string {
  const { out } = run(
    generateCommand({
      authority: { type: 'literal', text: authority },
      privateKey: PRIVATE_KEY,
      params: [],
      raw: false,
      ...extra,
    })
  );
  return out.text();
}

function inspectOptions(token: string, options: Partial<InspectOptions> = {}): InspectOptions {
  return {
    token: { type: 'literal', text: token },
    includeTime: false,
    params: [],
    limits: DEFAULT_RUN_LIMITS,
    queryAll: false,
    json: false,
    ...options,
  };
}

function revocationId(token: string, index = 0): string {
  return Biscuit.fromBase64(token).revocationIds()[index];
}

// ============================================================================
// KEYPAIR TESTS
// ============================================================================

describe('keypair', () => {
  it('should print both keys of a derived pair', () => {
    const { out } = run(keypairCommand({ from: PRIVATE_KEY, algorithm: 'ed25519', output: 'both', format: 'hex' }));

    expect(out.text()).toBe(
      'Generating a keypair from the provided private key\n' +
        `Private key: ed25519-private/${testKeys.privateKey}\n` +
        `Public key: ed25519/${testKeys.publicKey}\n`
    );
  });

  it('should print a single key with a newline', () => {
    const { out } = run(
      keypairCommand({ from: { type: 'stdin', format: 'hex' }, algorithm: 'ed25519', output: 'public', format: 'hex' }),
      { stdin: testKeys.privateKey }
    );

    expect(out.text()).toBe(`ed25519/${testKeys.publicKey}\n`);
  });

  it('should write a raw private key as its bytes only', () => {
    const { out } = run(keypairCommand({ from: PRIVATE_KEY, algorithm: 'ed25519', output: 'private', format: 'raw' }));

    expect(out.bytes()).toEqual(hexToBytes(testKeys.privateKey));
  });

  it('should print PEM keys', () => {
    const { out } = run(keypairCommand({ from: PRIVATE_KEY, algorithm: 'ed25519', output: 'both', format: 'pem' }));

    expect(out.text()).toBe(
      `Generating a keypair for the provided private key\n${root.privateKey.toPem()}${root.publicKey.toPem()}\n`
    );
  });

  it('should generate a pair of the requested algorithm', () => {
    const { out } = run(keypairCommand({ algorithm: 'secp256r1', output: 'both', format: 'hex' }));
    const lines = out.text().split('\n');

    expect(lines[0]).toBe('Generating a new random keypair');
    expect(lines[1]).toMatch(/^Private key: secp256r1-private\/[0-9a-f]{64}$/);
    expect(lines[2]).toMatch(/^Public key: secp256r1\/[0-9a-f]{66}$/);
  });

  it('should refuse both keys in raw format', () => {
    expect(() => keypairCommand({ algorithm: 'ed25519', output: 'both', format: 'raw' })).toThrow(
      new UsageError('Only a single key can be returned in a binary format')
    );
  });
});

// ============================================================================
// GENERATE TESTS
// ============================================================================

describe('generate', () => {
  it('should sign the authority block with the private key', () => {
    const token = Biscuit.fromBase64(generate(), root.publicKey);

    expect(token.blocks()[0].source).toBe('user("alice");\n');
  });

  it('should take the authority block from the editor', () => {
    const { out, editorLabels } = run(
      generateCommand({
        authority: { type: 'editor' },
        privateKey: PRIVATE_KEY,
        params: [parseParam('user=bob')],
        rootKeyId: 3,
        raw: true,
      }),
      { editor: 'user({user});' }
    );
    const token = Biscuit.fromBytes(out.bytes(), root.publicKey);

    expect(editorLabels).toEqual(['the authority block']);
    expect(token.blocks()[0].source).toBe('user("bob");\n');
    expect(token.rootKeyId).toBe(3);
  });

  it('should count a TTL from the current time', () => {
    const text = generate('user("alice");', { ttl: { kind: 'duration', ms: 60_000 }, context: 'login' });
    const block = Biscuit.fromBase64(text).blocks()[0];

    expect(block.source).toBe('user("alice");\ncheck if time($time), $time <= 2025-01-01T00:01:00Z;\n');
    expect(block.context).toBe('login');
  });

  it('should reject a TTL past year 9999 before signing', () => {
    expect(() => generate('user("alice");', { ttl: { kind: 'duration', ms: MAX_DATE.getTime() } })).toThrow(
      'build block: TTL expiration is after 9999-12-31T23:59:59Z'
    );
  });

  it('should reject two stdin inputs before reading either', () => {
    const definition = generateCommand({
      authority: { type: 'stdin' },
      privateKey: { type: 'stdin', format: 'hex' },
      params: [],
      raw: false,
    });
    const test = testContext({ stdin: 'user("alice");' });

    expect(() => runCommand(definition, test.context)).toThrow(
      new MultipleStdinConsumers(['the authority block', 'the private key'])
    );
    expect(test.context.io.stdin.used).toBe(false);
  });

  it('should wrap Datalog errors with the failing step', () => {
    expect(() => generate('user(')).toThrow(DelegateFailure);
    expect(() => generate('user(')).toThrow(/^build block: Unexpected end of input/);
    expect(() => generate('user("alice");', { params: [parseParam('extra=1')] })).toThrow(
      'build block: Unused parameters: extra'
    );
  });
});

// ============================================================================
// ATTENUATE AND SEAL TESTS
// ============================================================================

describe('attenuate and seal', () => {
  it('should append a block read from a file', () => {
    const { out } = run(
      attenuateCommand({
        token: { type: 'file', encoding: 'base64', path: 'token.bc' },
        block: { type: 'literal', text: 'check if operation("read");' },
        params: [],
        context: 'read only',
        raw: false,
      }),
      { files: { 'token.bc': generate() } }
    );
    const blocks = Biscuit.fromBase64(out.text(), root.publicKey).blocks();

    expect(blocks).toHaveLength(2);
    expect(blocks[1].source).toBe('check if operation("read");\n');
    expect(blocks[1].context).toBe('read only');
  });

  it('should read and write raw tokens', () => {
    const raw = fromBase64(generate());
    const { out } = run(
      attenuateCommand({
        token: { type: 'stdin', encoding: 'raw' },
        block: { type: 'literal', text: 'check if true;' },
        params: [],
        raw: true,
      }),
      { stdin: raw }
    );

    expect(Biscuit.fromBytes(out.bytes(), root.publicKey).blockCount).toBe(2);
  });

  it('should seal a token so it cannot be attenuated', () => {
    const { out } = run(sealCommand({ token: { type: 'literal', text: generate() }, raw: false }));
    const sealed = out.text();

    expect(Biscuit.fromBase64(sealed).sealed).toBe(true);
    expect(() =>
      run(
        attenuateCommand({
          token: { type: 'literal', text: sealed },
          block: { type: 'literal', text: 'check if true;' },
          params: [],
          raw: false,
        })
      )
    ).toThrow('append block: Cannot append a block to a sealed token');
  });

  it('should report a token that cannot be decoded', () => {
    expect(() => run(sealCommand({ token: { type: 'literal', text: 'AQI' }, raw: false }))).toThrow(/^decode token: /);
  });
});

// ============================================================================
// THIRD-PARTY TESTS
// ============================================================================

describe('third-party blocks', () => {
  const thirdParty = KeyPair.generate();

  it('should exchange a request and a block', () => {
    const token = generate();
    const request = run(generateRequestCommand({ token: { type: 'literal', text: token }, raw: false })).out.text();
    const block = run(
      generateThirdPartyBlockCommand({
        request: { type: 'literal', text: request },
        block: { type: 'literal', text: 'group({group});' },
        privateKey: { type: 'hex', text: thirdParty.privateKey.toString() },
        params: [parseParam('group=admin')],
        raw: false,
      })
    ).out.text();
    const appended = run(
      appendThirdPartyBlockCommand({
        token: { type: 'stdin', encoding: 'base64' },
        block: { type: 'literal', text: block },
        raw: false,
      }),
      { stdin: token }
    ).out.text();

    const last = Biscuit.fromBase64(appended, root.publicKey).blocks()[1];
    expect(last.source).toBe('group("admin");\n');
    expect(last.externalKey?.toString()).toBe(thirdParty.publicKey.toString());
  });

  it('should not let the token and the block both read stdin', () => {
    const definition = appendThirdPartyBlockCommand({
      token: { type: 'stdin', encoding: 'base64' },
      block: { type: 'stdin', encoding: 'base64' },
      raw: false,
    });

    expect(() => run(definition)).toThrow(
      'Standard input can only be used by one input, but both the token and the third-party block need it'
    );
  });

  it('should refuse a request for a sealed token', () => {
    const sealed = run(sealCommand({ token: { type: 'literal', text: generate() }, raw: false })).out.text();

    expect(() => run(generateRequestCommand({ token: { type: 'literal', text: sealed }, raw: false }))).toThrow(
      'generate request: Cannot request a third-party block for a sealed token'
    );
  });
});

// ============================================================================
// INSPECT TESTS
// ============================================================================

describe('inspect', () => {
  it('should print the blocks without checking the signature', () => {
    const token = generate();
    const { out } = run(inspectCommand(inspectOptions(token)));

    expect(out.text()).toBe(
      [
        'Biscuit token (attenuable)',
        RULE,
        'Blocks: 1',
        '',
        'Block 0 (authority):',
        `  Revocation id: ${revocationId(token)}`,
        '  user("alice");',
        '',
        'Signature: not checked (no public key given)',
        '',
      ].join('\n')
    );
  });

  it('should skip authorization and warn about params without a public key', () => {
    const { out, warnings } = run(
      inspectCommand(
        inspectOptions(generate(), {
          authorizer: { type: 'datalog', source: { type: 'literal', text: 'allow if true;' } },
          params: [parseParam('user=alice')],
        })
      )
    );

    expect(out.text()).toContain('\nAuthorization: skipped (the signature was not checked)\n');
    expect(warnings).toEqual(['parameters are ignored when no public key is given']);
  });

  it('should verify, authorize and query', () => {
    const token = generate('user("alice");', { rootKeyId: 1, context: 'login' });
    const { out } = run(
      inspectCommand(
        inspectOptions(token, {
          publicKey: PUBLIC_KEY,
          authorizer: { type: 'datalog', source: { type: 'literal', text: 'allow if user({user});' } },
          params: [parseParam('user=alice')],
          query: parseRule('u($x) <- user($x)'),
        })
      )
    );

    expect(out.text()).toBe(
      [
        'Biscuit token (attenuable)',
        RULE,
        'Root key id: 1',
        'Blocks: 1',
        '',
        'Block 0 (authority):',
        `  Revocation id: ${revocationId(token)}`,
        '  Context: login',
        '  user("alice");',
        '',
        `Signature: VALID ✓ (ed25519/${testKeys.publicKey})`,
        'Authorization: ALLOWED ✓ (policy #0: allow if user("alice"))',
        'Query: u($x) <- user($x)',
        '  u("alice")',
        '',
      ].join('\n')
    );
  });

  it('should fail with another public key', () => {
    const other = KeyPair.generate().publicKey.toString();

    expect(() => run(inspectCommand(inspectOptions(generate(), { publicKey: { type: 'hex', text: other } })))).toThrow(
      'verify signature: Signature verification failed: the token was not signed by this root key'
    );
  });

  it('should fail when authorization fails', () => {
    const options = inspectOptions(generate(), {
      publicKey: PUBLIC_KEY,
      authorizer: { type: 'datalog', source: { type: 'literal', text: 'allow if user("bob");' } },
    });

    expect(() => run(inspectCommand(options))).toThrow('authorize: Authorization failed: no policy matched');
  });

  it('should reject params the authorizer does not use', () => {
    const options = inspectOptions(generate(), {
      publicKey: PUBLIC_KEY,
      authorizer: { type: 'datalog', source: { type: 'literal', text: 'allow if true;' } },
      params: [parseParam('user=alice')],
    });

    expect(() => run(inspectCommand(options))).toThrow('check parameters: Unused parameters: user');
  });

  it('should query every block with queryAll', () => {
    const token = run(
      attenuateCommand({
        token: { type: 'literal', text: generate() },
        block: { type: 'literal', text: 'user("mallory");' },
        params: [],
        raw: false,
      })
    ).out.text();
    const { out } = run(
      inspectCommand(
        inspectOptions(token, { publicKey: PUBLIC_KEY, query: parseRule('u($x) <- user($x)'), queryAll: true })
      )
    );

    const lines = out.text().split('\n');
    const start = lines.indexOf('Query (all blocks): u($x) <- user($x)');
    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start + 1, start + 3).sort()).toEqual(['  u("alice")', '  u("mallory")']);
  });

  it('should dump snapshots after authorization', () => {
    const { out, written } = run(
      inspectCommand(
        inspectOptions(generate(), {
          publicKey: PUBLIC_KEY,
          authorizer: { type: 'datalog', source: { type: 'literal', text: 'allow if user("alice");' } },
          includeTime: true,
          dumpSnapshot: { path: 'full.snapshot', raw: false },
          dumpPoliciesSnapshot: { path: 'policies.snapshot', raw: true },
        })
      )
    );

    const full = written.get('full.snapshot');
    const policies = written.get('policies.snapshot');
    if (typeof full !== 'string' || !(policies instanceof Uint8Array)) {
      throw new Error('snapshots were not written in the requested encodings');
    }
    const restored = Authorizer.fromSnapshot(fromBase64(full));
    expect(restored.currentTime).toEqual(new Date('2025-01-01T00:00:00Z'));
    expect(restored.authorize().index).toBe(0);
    expect(Authorizer.fromSnapshot(policies).tokenBlocks).toHaveLength(0);
    expect(out.text()).toContain(
      '\nAuthorizer snapshot written to: full.snapshot\nPolicies snapshot written to: policies.snapshot\n'
    );
  });

  it('should authorize with a policies snapshot', () => {
    const snapshot = Authorizer.fromSource('allow if user("alice");').policiesSnapshot();
    const { out } = run(
      inspectCommand(
        inspectOptions(generate(), {
          publicKey: PUBLIC_KEY,
          authorizer: { type: 'snapshot', source: { type: 'file', encoding: 'raw', path: 'policies' } },
        })
      ),
      { files: { policies: snapshot } }
    );

    expect(out.text()).toContain('\nAuthorization: ALLOWED ✓ (policy #0: allow if user("alice"))\n');
  });

  it('should report snapshot write failures', () => {
    const options = inspectOptions(generate(), {
      publicKey: PUBLIC_KEY,
      dumpSnapshot: { path: 'out/full.snapshot', raw: false },
    });

    expect(() => run(inspectCommand(options), { writeError: 'disk full' })).toThrow(
      new IoFailure('out/full.snapshot', new Error('disk full'), 'write')
    );
  });

  it('should print JSON', () => {
    const token = generate();
    const { out } = run(inspectCommand(inspectOptions(token, { publicKey: PUBLIC_KEY, json: true })));

    expect(JSON.parse(out.text())).toEqual({
      sealed: false,
      blocks: [{ index: 0, revocationId: revocationId(token), code: 'user("alice");\n' }],
      signature: { status: 'valid', publicKey: `ed25519/${testKeys.publicKey}` },
      snapshots: [],
    });
  });
});

// ============================================================================
// INSPECT-SNAPSHOT TESTS
// ============================================================================

describe('inspect-snapshot', () => {
  function snapshotOf(source: string): Uint8Array {
    const token = Biscuit.fromBase64(generate());
    return Authorizer.fromSource(source).addToken(token).setTime(new Date('2025-01-01T00:00:00Z')).snapshot();
  }

  it('should print the stored authorizer and its result', () => {
    const snapshot = snapshotOf('allow if user("alice");');
    const { out } = run(
      inspectSnapshotCommand({
        snapshot: { type: 'file', encoding: 'raw', path: 'snap' },
        params: [],
        limits: DEFAULT_RUN_LIMITS,
        queryAll: false,
        json: false,
      }),
      { files: { snap: snapshot } }
    );
    const token = Authorizer.fromSnapshot(snapshot).tokenBlocks[0];

    expect(out.text()).toBe(
      [
        'Authorizer snapshot',
        RULE,
        'Time: 2025-01-01T00:00:00Z',
        'Token blocks: 1',
        '',
        'Block 0 (authority):',
        `  Revocation id: ${token.revocationId}`,
        '  user("alice");',
        '',
        'Authorizer:',
        '  allow if user("alice");',
        '',
        'Authorization: ALLOWED ✓ (policy #0: allow if user("alice"))',
        '',
      ].join('\n')
    );
  });

  it('should report a failed authorization instead of throwing', () => {
    const { out } = run(
      inspectSnapshotCommand({
        snapshot: { type: 'stdin', encoding: 'raw' },
        params: [parseParam('name=alice')],
        limits: DEFAULT_RUN_LIMITS,
        query: parseRule('u($x) <- user($x), $x == {name}'),
        queryAll: false,
        json: true,
      }),
      { stdin: snapshotOf('allow if user("bob");') }
    );

    expect(JSON.parse(out.text())).toMatchObject({
      time: '2025-01-01T00:00:00Z',
      authorization: { status: 'failed', error: 'Authorization failed: no policy matched' },
      query: { status: 'done', rule: 'u($x) <- user($x), $x == "alice"', all: false, facts: ['u("alice")'] },
    });
  });
});
