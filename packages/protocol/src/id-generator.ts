/**
 * Monotonic ID Generator
 *
 * Generates unique, lexicographically sortable correlation ids.
 *
 * Format: <timestamp-base36>-<counter-base36>-<nodeId>
 * Example: "lxyz5g8-0001-7d2a"
 *
 * Ids never repeat within a process, even if the wall clock steps backwards.
 */

export class IdGenerator {
  private counter = 0;
  private readonly prefix: string;
  private lastTs = 0;

  constructor(nodeId?: string) {
    this.prefix = nodeId ?? `${process.pid.toString(36)}${Math.random().toString(36).slice(2, 6)}`;
  }

  /**
   * Generate a unique, monotonically increasing ID.
   */
  next(): string {
    const now = Date.now();

    if (now > this.lastTs) {
      this.lastTs = now;
      this.counter = 0;
    }

    const ts = this.lastTs.toString(36);
    const seq = (this.counter++).toString(36).padStart(4, '0');
    return `${ts}-${seq}-${this.prefix}`;
  }
}

// Singleton instance for the process
export const idGen = new IdGenerator();

/**
 * Generate a unique ID.
 */
export function generateId(): string {
  return idGen.next();
}

/** Correlation id for an outgoing request. */
export function generateRequestId(): string {
  return `req_${idGen.next()}`;
}

/** Opaque id for an accepted connection. */
export function generateConnectionId(): string {
  return `conn_${idGen.next()}`;
}
