import { concatBytes, textEncoder, toBase64 } from './encoding.js';

/**
 * Where payloads go: stdout in the binary, memory in tests
 */
export interface OutputSink {
  write(chunk: Uint8Array | string): void;
}

/**
 * Raw bytes unchanged, otherwise URL-safe base64 text
 */
export function encodeOutput(payload: Uint8Array, raw: boolean): Uint8Array | string {
  return raw ? payload : toBase64(payload);
}

/**
 * Write an encoded payload, without a trailing newline
 */
export function writeOutput(sink: OutputSink, payload: Uint8Array, raw: boolean): void {
  sink.write(encodeOutput(payload, raw));
}

/**
 * Sink that keeps everything written to it
 */
export class MemorySink implements OutputSink {
  private readonly chunks: Uint8Array[] = [];

  write(chunk: Uint8Array | string): void {
    this.chunks.push(typeof chunk === 'string' ? textEncoder.encode(chunk) : chunk);
  }

  bytes(): Uint8Array {
    return concatBytes(...this.chunks);
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }
}
