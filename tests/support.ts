/**
 * Shared fixtures: the test key pair and an in-memory command context
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Editor } from '../src/lib/input/editor.js';
import { Stdin } from '../src/lib/input/stdin.js';
import type { Logger } from '../src/lib/log.js';
import { MemorySink } from '../src/lib/output.js';
import type { CommandContext } from '../src/lib/pipeline.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

interface TestKeys {
  privateKey: string;
  publicKey: string;
}

export const testKeys: TestKeys = JSON.parse(
  fs.readFileSync(path.join(__dirname, 'vectors', 'test-keys.json'), 'utf-8')
);

export interface ContextOptions {
  stdin?: string | Uint8Array;
  files?: Record<string, string | Uint8Array>;
  /** what the editor returns */
  editor?: string;
  now?: Date;
  /** make snapshot writes fail with this message */
  writeError?: string;
}

export interface TestContext {
  context: CommandContext;
  out: MemorySink;
  written: Map<string, Uint8Array | string>;
  warnings: string[];
  debug: string[];
  editorLabels: string[];
}

export function testContext(options: ContextOptions = {}): TestContext {
  const out = new MemorySink();
  const written = new Map<string, Uint8Array | string>();
  const warnings: string[] = [];
  const debug: string[] = [];
  const editorLabels: string[] = [];

  const editor: Editor = {
    edit(label) {
      editorLabels.push(label);
      if (options.editor === undefined) {
        throw new Error('no editor in this test');
      }
      return options.editor;
    },
  };
  const log: Logger = {
    debug: (message) => debug.push(message),
    warn: (message) => warnings.push(message),
  };

  const context: CommandContext = {
    io: {
      stdin: options.stdin === undefined ? new Stdin(() => new Uint8Array()) : Stdin.of(options.stdin),
      editor,
      readFile(file) {
        const contents = options.files?.[file];
        if (contents === undefined) {
          throw new Error(`ENOENT: no such file or directory, open '${file}'`);
        }
        return typeof contents === 'string' ? new TextEncoder().encode(contents) : contents;
      },
    },
    out,
    log,
    now: () => options.now ?? new Date('2025-01-01T00:00:00Z'),
    writeFile(file, data) {
      if (options.writeError !== undefined) {
        throw new Error(options.writeError);
      }
      written.set(file, data);
    },
  };

  return { context, out, written, warnings, debug, editorLabels };
}
