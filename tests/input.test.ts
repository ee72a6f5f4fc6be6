/**
 * Tests for input sources, stdin conflicts and resolvers
 */

import { describe, it, expect, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { hexToBytes } from '../src/lib/encoding.js';
import {
  InternalError,
  InvalidText,
  IoFailure,
  MalformedEncoding,
  MultipleStdinConsumers,
  UsageError,
} from '../src/lib/errors.js';
import { ensureNoInputConflict, type LabelledSource } from '../src/lib/input/conflicts.js';
import { editorCommand, hasContent } from '../src/lib/input/editor.js';
import {
  readFileBytes,
  resolveDatalog,
  resolvePrivateKey,
  resolvePublicKey,
  resolveToken,
  type InputContext,
} from '../src/lib/input/resolve.js';
import {
  authoritySource,
  authorizerSource,
  blockContentsSource,
  blockSource,
  keySource,
  privateKeySource,
  tokenSource,
} from '../src/lib/input/sources.js';
import { Stdin } from '../src/lib/input/stdin.js';
import { testContext, testKeys, type ContextOptions } from './support.js';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'biscuit-test-'));

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function io(options: ContextOptions = {}): InputContext {
  return testContext(options).context.io;
}

const noAuthorizer = {
  authorizeInteractive: false,
  authorizeWithRawSnapshotFile: false,
};

// ============================================================================
// SOURCE TESTS
// ============================================================================

describe('sources', () => {
  it('should map - to standard input', () => {
    expect(keySource({ file: '-', format: 'hex' })).toEqual({ type: 'stdin', format: 'hex' });
    expect(tokenSource('-', true)).toEqual({ type: 'stdin', encoding: 'raw' });
    expect(tokenSource('token.bc', false)).toEqual({ type: 'file', encoding: 'base64', path: 'token.bc' });
    expect(authoritySource('-')).toEqual({ type: 'stdin' });
  });

  it('should open the editor when no block is given', () => {
    expect(authoritySource()).toEqual({ type: 'editor' });
    expect(blockSource({})).toEqual({ type: 'editor' });
    expect(blockSource({ block: 'check if true;' })).toEqual({ type: 'literal', text: 'check if true;' });
  });

  it('should reject raw key literals', () => {
    expect(() => keySource({ key: 'abcd', format: 'raw' })).toThrow(
      new UsageError('raw key input is only allowed from a file or stdin')
    );
  });

  it('should reject an algorithm for a key literal', () => {
    expect(() => keySource({ key: 'abcd', format: 'hex', algorithm: 'secp256r1' })).toThrow(UsageError);
  });

  it('should require a signing key', () => {
    expect(() => privateKeySource({ format: 'hex' })).toThrow('one of --private-key or --private-key-file is required');
  });

  it('should treat combinations the option parser forbids as internal errors', () => {
    expect(() => keySource({ key: 'a', file: 'b', format: 'hex' })).toThrow(InternalError);
    expect(() => blockSource({ block: 'a', blockFile: 'b' })).toThrow(InternalError);
    expect(() => authorizerSource({ ...noAuthorizer, authorizeWith: 'a', authorizeWithFile: 'b' })).toThrow(
      'Internal error: several authorizer inputs were given'
    );
  });

  it('should require a snapshot file for raw snapshots', () => {
    expect(() => authorizerSource({ ...noAuthorizer, authorizeWithRawSnapshotFile: true })).toThrow(
      '--authorize-with-raw-snapshot-file requires --authorize-with-snapshot-file'
    );
  });

  it('should pick the authorizer input that was given', () => {
    expect(authorizerSource(noAuthorizer)).toBeUndefined();
    expect(authorizerSource({ ...noAuthorizer, authorizeInteractive: true })).toEqual({
      type: 'datalog',
      source: { type: 'editor' },
    });
    expect(
      authorizerSource({ ...noAuthorizer, authorizeWithSnapshotFile: 'snap', authorizeWithRawSnapshotFile: true })
    ).toEqual({ type: 'snapshot', source: { type: 'file', encoding: 'raw', path: 'snap' } });
  });

  it('should validate third-party block contents', () => {
    expect(() => blockContentsSource({ rawBlockContents: false })).toThrow(
      'one of --block-contents or --block-contents-file is required'
    );
    expect(() => blockContentsSource({ blockContents: 'abc', rawBlockContents: true })).toThrow(
      '--raw-block-contents requires --block-contents-file'
    );
    expect(blockContentsSource({ blockContentsFile: '-', rawBlockContents: true })).toEqual({
      type: 'stdin',
      encoding: 'raw',
    });
  });
});

// ============================================================================
// CONFLICT TESTS
// ============================================================================

describe('stdin conflicts', () => {
  const token: LabelledSource = { label: 'the token', source: { type: 'stdin', encoding: 'base64' } };
  const block: LabelledSource = { label: 'the block', source: { type: 'editor' } };
  const key: LabelledSource = { label: 'the private key', source: { type: 'file', format: 'hex', path: 'key' } };

  it('should name both inputs in order', () => {
    expect(() => ensureNoInputConflict([token, key, block])).toThrow(
      'Standard input can only be used by one input, but both the token and the block need it'
    );
    expect(() => ensureNoInputConflict([block, token])).toThrow(
      'Standard input can only be used by one input, but both the block and the token need it'
    );
  });

  it('should report the conflicting labels', () => {
    try {
      ensureNoInputConflict([block, undefined, token]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MultipleStdinConsumers);
      if (error instanceof MultipleStdinConsumers) {
        expect(error.inputs).toEqual(['the block', 'the token']);
      }
    }
  });

  it('should allow a single stdin consumer', () => {
    expect(() => ensureNoInputConflict([token, key, undefined])).not.toThrow();
  });
});

// ============================================================================
// RESOLVER TESTS
// ============================================================================

describe('resolvers', () => {
  it('should read standard input once', () => {
    const stdin = Stdin.of('abc');

    expect(new TextDecoder().decode(stdin.read())).toBe('abc');
    expect(stdin.used).toBe(true);
    expect(() => stdin.read()).toThrow(InternalError);
  });

  it('should report stdin read failures', () => {
    const stdin = new Stdin(() => {
      throw new Error('EAGAIN');
    });

    expect(() => stdin.read()).toThrow('Could not read standard input: EAGAIN');
  });

  it('should decode hex private keys from literals and stdin', () => {
    const fromLiteral = resolvePrivateKey({ type: 'hex', text: testKeys.privateKey }, io());
    const fromStdin = resolvePrivateKey({ type: 'stdin', format: 'hex' }, io({ stdin: `${testKeys.privateKey}\n` }));

    expect(fromLiteral.toString()).toBe(`ed25519-private/${testKeys.privateKey}`);
    expect(fromStdin.toString()).toBe(fromLiteral.toString());
  });

  it('should read raw public keys from a file', () => {
    const file = path.join(tmpDir, 'public.raw');
    fs.writeFileSync(file, hexToBytes(testKeys.publicKey));
    const context: InputContext = { ...io(), readFile: readFileBytes };

    expect(resolvePublicKey({ type: 'file', format: 'raw', path: file }, context).toString()).toBe(
      `ed25519/${testKeys.publicKey}`
    );
  });

  it('should read PEM keys', () => {
    const context = io({ files: { 'key.pem': resolvePrivateKey({ type: 'hex', text: testKeys.privateKey }, io()).toPem() } });

    expect(resolvePrivateKey({ type: 'file', format: 'pem', path: 'key.pem' }, context).toString()).toBe(
      `ed25519-private/${testKeys.privateKey}`
    );
  });

  it('should report malformed keys', () => {
    expect(() => resolvePublicKey({ type: 'hex', text: 'zz' }, io())).toThrow(MalformedEncoding);
    expect(() => resolvePublicKey({ type: 'hex', text: 'zz' }, io())).toThrow(/^Malformed hex public key: /);
  });

  it('should report missing files', () => {
    expect(() => resolveToken({ type: 'file', encoding: 'base64', path: 'missing.bc' }, io())).toThrow(IoFailure);
    expect(() => resolveToken({ type: 'file', encoding: 'base64', path: 'missing.bc' }, io())).toThrow(
      /^Could not read missing\.bc: ENOENT/
    );
  });

  it('should decode base64 and raw tokens', () => {
    const context = io({ files: { 'token.bc': ' AQI=\n', 'token.raw': new Uint8Array([1, 2]) } });

    expect(resolveToken({ type: 'file', encoding: 'base64', path: 'token.bc' }, context)).toEqual(new Uint8Array([1, 2]));
    expect(resolveToken({ type: 'file', encoding: 'raw', path: 'token.raw' }, context)).toEqual(new Uint8Array([1, 2]));
    expect(resolveToken({ type: 'literal', text: 'AQI' }, context)).toEqual(new Uint8Array([1, 2]));
  });

  it('should report malformed base64', () => {
    expect(() => resolveToken({ type: 'literal', text: '!!!' }, io(), 'snapshot')).toThrow(/^Malformed base64 snapshot: /);
  });

  it('should reject Datalog that is not UTF-8', () => {
    const context = io({ stdin: new Uint8Array([0xff]), files: { 'block.dl': new Uint8Array([0xff]) } });

    expect(() => resolveDatalog({ type: 'stdin' }, context, 'the authorizer')).toThrow(
      new InvalidText('the authorizer (from standard input)')
    );
    expect(() => resolveDatalog({ type: 'file', path: 'block.dl' }, context)).toThrow('block.dl is not valid UTF-8 text');
  });

  it('should pass the label to the editor', () => {
    const { context, editorLabels } = testContext({ editor: 'user("alice");' });

    expect(resolveDatalog({ type: 'editor' }, context.io, 'the authority block')).toBe('user("alice");');
    expect(editorLabels).toEqual(['the authority block']);
  });
});

// ============================================================================
// EDITOR TESTS
// ============================================================================

describe('editor', () => {
  it('should prefer VISUAL, then EDITOR, then vi', () => {
    expect(editorCommand({ VISUAL: 'code --wait', EDITOR: 'nano' })).toBe('code --wait');
    expect(editorCommand({ VISUAL: ' ', EDITOR: 'nano' })).toBe('nano');
    expect(editorCommand({})).toBe('vi');
  });

  it('should ignore comment lines when checking for content', () => {
    expect(hasContent('// Write the Datalog\n\n')).toBe(false);
    expect(hasContent('// Write the Datalog\nuser("alice");\n')).toBe(true);
  });
});
