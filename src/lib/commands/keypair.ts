import { UsageError } from '../errors.js';
import { resolvePrivateKey } from '../input/resolve.js';
import type { KeyFormat, KeySource } from '../input/sources.js';
import { KeyPair, type Algorithm, type PrivateKey } from '../keys.js';
import type { CommandDefinition } from '../pipeline.js';

export type KeyOutput = 'both' | 'private' | 'public';

export interface KeypairOptions {
  /** derive the pair from this key instead of generating one */
  from?: KeySource;
  algorithm: Algorithm;
  output: KeyOutput;
  format: KeyFormat;
}

function render(pair: KeyPair, derived: boolean, output: KeyOutput, format: KeyFormat): Uint8Array | string {
  const { privateKey, publicKey } = pair;

  switch (output) {
    case 'private':
      if (format === 'raw') return privateKey.toBytes();
      return (format === 'hex' ? privateKey.toString() : privateKey.toPem()) + '\n';
    case 'public':
      if (format === 'raw') return publicKey.toBytes();
      return (format === 'hex' ? publicKey.toString() : publicKey.toPem()) + '\n';
    case 'both':
      if (format === 'hex') {
        return [
          derived ? 'Generating a keypair from the provided private key' : 'Generating a new random keypair',
          `Private key: ${privateKey.toString()}`,
          `Public key: ${publicKey.toString()}`,
          '',
        ].join('\n');
      }
      if (format === 'pem') {
        const header = derived ? 'Generating a keypair for the provided private key' : 'Generating a new random keypair';
        return `${header}\n${privateKey.toPem()}${publicKey.toPem()}\n`;
      }
      throw new UsageError('Only a single key can be returned in a binary format');
  }
}

/**
 * Generate a key pair, or derive one from a private key
 */
export function keypairCommand(options: KeypairOptions): CommandDefinition<PrivateKey | undefined, Uint8Array | string> {
  if (options.output === 'both' && options.format === 'raw') {
    throw new UsageError('Only a single key can be returned in a binary format');
  }

  return {
    name: 'keypair',
    sources: [options.from && { label: 'the private key', source: options.from }],
    resolve: (io) => (options.from ? resolvePrivateKey(options.from, io) : undefined),
    execute: (privateKey) => {
      const pair = privateKey ? KeyPair.fromPrivateKey(privateKey) : KeyPair.generate(options.algorithm);
      return render(pair, privateKey !== undefined, options.output, options.format);
    },
    emit: (result, out) => out.write(result),
  };
}
