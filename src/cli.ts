#!/usr/bin/env node
/**
 * biscuit - command line tool for biscuit authorization tokens
 *
 * Commands:
 *   keypair                             - Create and convert key pairs
 *   generate                            - Create a token from an authority block
 *   attenuate                           - Append a block to a token
 *   seal                                - Seal a token
 *   inspect                             - Print, verify, authorize and query a token
 *   inspect-snapshot                    - Print and query an authorizer snapshot
 *   generate-third-party-block-request  - Request a third-party block
 *   generate-third-party-block          - Answer a third-party block request
 *   append-third-party-block            - Append a third-party block to a token
 */

import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { errorMessage } from './lib/errors.js';
import { ExternalEditor } from './lib/input/editor.js';
import { readFileBytes } from './lib/input/resolve.js';
import { Stdin } from './lib/input/stdin.js';
import { createLogger } from './lib/log.js';
import type { CommandContext } from './lib/pipeline.js';
import { createProgram, type GlobalOptions } from './program.js';

// Get package version
const __dirname = path.dirname(fileURLToPath(import.meta.url));
let version = '0.1.0';
try {
  const pkgPath = path.resolve(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }
} catch (error) {
  console.error(chalk.dim(`debug: package version unavailable: ${errorMessage(error)}`));
}

function processContext({ verbose }: GlobalOptions): CommandContext {
  return {
    io: { stdin: new Stdin(), editor: new ExternalEditor(), readFile: readFileBytes },
    out: { write: (chunk) => process.stdout.write(chunk) },
    log: createLogger({ verbose }),
    now: () => new Date(),
    writeFile: (file, data) => fs.writeFileSync(file, data),
  };
}

const program = createProgram(version, processContext);

try {
  program.parse();
} catch (error) {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
}
