/**
 * Serializes frame writes on one stream.
 *
 * Each frame is handed to the sink in a single write call and the next write
 * only starts once the previous one has flushed, so frames from concurrent
 * senders never interleave on the wire.
 */

import { ConnectionError } from '@hostbridge/utils/errors';

export interface FrameSink {
  write(chunk: Buffer, cb: (err?: Error | null) => void): boolean;
}

export class SerialFrameWriter {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private closed = false;

  constructor(private readonly sink: FrameSink) {}

  /** Writes waiting for (or in) flight. */
  get pending(): number {
    return this.queued;
  }

  write(frame: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('writer closed'));
    }

    this.queued++;
    const result = this.tail.then(() => this.writeOne(frame));
    const settled = result.finally(() => {
      this.queued--;
    });
    // Failures reach the caller through `result`; the chain itself keeps going.
    this.tail = settled.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Reject writes queued from now on. */
  close(): void {
    this.closed = true;
  }

  private writeOne(frame: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionError('writer closed'));
    }
    return new Promise((resolve, reject) => {
      this.sink.write(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
