/**
 * Pending request table.
 *
 * Every registered id settles exactly once: with a value, a timeout or a
 * cancellation. Late settlements are ignored and reported as `false`.
 */

import { CancelledError, HostBridgeError, TimeoutError } from '@hostbridge/utils/errors';

interface PendingEntry<T> {
  command: string;
  createdAt: number;
  deadline: number;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
  timeoutHandle: NodeJS.Timeout;
}

export interface PendingRequestInfo {
  id: string;
  command: string;
  createdAt: number;
  deadline: number;
}

export class PendingRequests<T> {
  private entries: Map<string, PendingEntry<T>> = new Map();

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  list(): PendingRequestInfo[] {
    return Array.from(this.entries.entries()).map(([id, entry]) => ({
      id,
      command: entry.command,
      createdAt: entry.createdAt,
      deadline: entry.deadline,
    }));
  }

  /**
   * Register an id and get the promise its settlement resolves.
   */
  register(id: string, command: string, timeoutMs: number): Promise<T> {
    if (this.entries.has(id)) {
      return Promise.reject(new HostBridgeError(`Duplicate request id: ${id}`));
    }

    return new Promise<T>((resolve, reject) => {
      const createdAt = Date.now();
      const timeoutHandle = setTimeout(() => {
        this.entries.delete(id);
        reject(new TimeoutError(command, timeoutMs));
      }, timeoutMs);

      this.entries.set(id, {
        command,
        createdAt,
        deadline: createdAt + timeoutMs,
        resolve,
        reject,
        timeoutHandle,
      });
    });
  }

  resolve(id: string, value: T): boolean {
    const entry = this.take(id);
    if (!entry) return false;
    entry.resolve(value);
    return true;
  }

  reject(id: string, err: Error): boolean {
    const entry = this.take(id);
    if (!entry) return false;
    entry.reject(err);
    return true;
  }

  cancel(id: string, reason?: string): boolean {
    return this.reject(id, new CancelledError(id, reason));
  }

  /** Cancel everything still pending. Returns how many were cancelled. */
  cancelAll(reason?: string): number {
    const ids = Array.from(this.entries.keys());
    for (const id of ids) {
      this.cancel(id, reason);
    }
    return ids.length;
  }

  private take(id: string): PendingEntry<T> | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    clearTimeout(entry.timeoutHandle);
    this.entries.delete(id);
    return entry;
  }
}
