import { spawnSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { EditorFailure } from '../errors.js';

export interface Editor {
  /**
   * Let the user write Datalog for `label` and return the saved text
   */
  edit(label: string): string;
}

/**
 * Editor command from `VISUAL`, then `EDITOR`, then `vi`
 */
export function editorCommand(env: NodeJS.ProcessEnv = process.env): string {
  for (const value of [env.VISUAL, env.EDITOR]) {
    if (value && value.trim().length > 0) return value.trim();
  }
  return 'vi';
}

/**
 * Whether the buffer holds anything besides `//` comment lines
 */
export function hasContent(text: string): boolean {
  return text.split('\n').some((line) => {
    const trimmed = line.trim();
    return trimmed.length > 0 && !trimmed.startsWith('//');
  });
}

export class ExternalEditor implements Editor {
  constructor(private readonly command: string = editorCommand()) {}

  edit(label: string): string {
    const [program, ...args] = this.command.split(/\s+/);
    const dir = mkdtempSync(path.join(tmpdir(), 'biscuit-'));
    const file = path.join(dir, 'input.biscuit-datalog');

    try {
      writeFileSync(file, `// Write the Datalog for ${label}, then save and quit\n`);

      const result = spawnSync(program, [...args, file], { stdio: 'inherit' });
      if (result.error) {
        throw new EditorFailure(`could not start "${program}": ${result.error.message}`, result.error);
      }
      if (result.status !== 0) {
        const reason = result.status === null ? `signal ${result.signal ?? 'unknown'}` : `status ${result.status}`;
        throw new EditorFailure(`"${program}" exited with ${reason}`);
      }

      const text = readFileSync(file, 'utf-8');
      if (!hasContent(text)) {
        throw new EditorFailure(`no Datalog was written for ${label}`);
      }
      return text;
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
