/**
 * Incremental handshake token reader.
 *
 * Bytes are accumulated until the expected token appears. Anything after the
 * token belongs to framed traffic and is handed back to the caller.
 */

import { START_MARKER } from './framing.js';

export const DEFAULT_HANDSHAKE_MAX_BYTES = 1024;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

export type HandshakeResult =
  | { status: 'pending' }
  | { status: 'matched'; rest: Buffer }
  | { status: 'failed'; reason: string };

export class HandshakeReader {
  private buffer: Buffer = Buffer.alloc(0);
  private done = false;
  private readonly token: Buffer;

  constructor(
    token: string,
    private readonly maxBytes: number = DEFAULT_HANDSHAKE_MAX_BYTES
  ) {
    this.token = Buffer.from(token, 'utf-8');
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(data: Buffer): HandshakeResult {
    if (this.done) {
      return { status: 'failed', reason: 'handshake already completed' };
    }

    this.buffer = Buffer.concat([this.buffer, data]);
    const index = this.buffer.indexOf(this.token);

    if (index >= 0) {
      if (this.buffer.subarray(0, index).includes(START_MARKER)) {
        return this.fail('framed data before handshake');
      }
      this.done = true;
      const rest = Buffer.from(this.buffer.subarray(index + this.token.length));
      this.buffer = Buffer.alloc(0);
      return { status: 'matched', rest };
    }

    if (this.buffer.includes(START_MARKER)) {
      return this.fail('framed data before handshake');
    }
    if (this.buffer.length >= this.maxBytes) {
      return this.fail(`no handshake token within ${this.maxBytes} bytes`);
    }
    return { status: 'pending' };
  }

  private fail(reason: string): HandshakeResult {
    this.done = true;
    this.buffer = Buffer.alloc(0);
    return { status: 'failed', reason };
  }
}
