import { readFileSync } from 'node:fs';
import { textEncoder } from '../encoding.js';
import { IoFailure, InternalError } from '../errors.js';

/**
 * Standard input, readable once per invocation
 */
export class Stdin {
  private consumed = false;

  constructor(private readonly readAll: () => Uint8Array = () => new Uint8Array(readFileSync(0))) {}

  /**
   * Stand-in for tests: stdin that yields `contents`
   */
  static of(contents: Uint8Array | string): Stdin {
    const bytes = typeof contents === 'string' ? textEncoder.encode(contents) : contents;
    return new Stdin(() => bytes);
  }

  get used(): boolean {
    return this.consumed;
  }

  read(): Uint8Array {
    if (this.consumed) {
      throw new InternalError('standard input was already read by another input');
    }
    this.consumed = true;
    try {
      return this.readAll();
    } catch (error) {
      throw new IoFailure('standard input', error);
    }
  }
}
