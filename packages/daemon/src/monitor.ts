/**
 * Execution monitor: per-operation call counts and timings.
 */

import { createLogger, type Logger } from '@hostbridge/utils/logger';

export interface OperationStats {
  count: number;
  errors: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  lastMs: number;
}

export class ExecutionMonitor {
  private stats: Map<string, OperationStats> = new Map();
  private reportTimer?: NodeJS.Timeout;
  private readonly log: Logger;

  constructor(logger: Logger = createLogger('monitor')) {
    this.log = logger;
  }

  record(operation: string, durationMs: number, success = true): void {
    const current = this.stats.get(operation);
    if (!current) {
      this.stats.set(operation, {
        count: 1,
        errors: success ? 0 : 1,
        totalMs: durationMs,
        avgMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs,
        lastMs: durationMs,
      });
      return;
    }

    current.count++;
    if (!success) current.errors++;
    current.totalMs += durationMs;
    current.avgMs = current.totalMs / current.count;
    current.minMs = Math.min(current.minMs, durationMs);
    current.maxMs = Math.max(current.maxMs, durationMs);
    current.lastMs = durationMs;
  }

  get(operation: string): OperationStats | undefined {
    const stats = this.stats.get(operation);
    return stats ? { ...stats } : undefined;
  }

  snapshot(): Record<string, OperationStats> {
    const out: Record<string, OperationStats> = {};
    for (const [operation, stats] of this.stats) {
      out[operation] = { ...stats };
    }
    return out;
  }

  reset(): void {
    this.stats.clear();
  }

  /** Log one line per operation */
  report(): void {
    if (this.stats.size === 0) return;
    this.log.info('Execution report', { operations: this.stats.size });
    for (const [operation, s] of this.stats) {
      this.log.info(operation, {
        count: s.count,
        errors: s.errors,
        avgMs: Number(s.avgMs.toFixed(2)),
        minMs: Number(s.minMs.toFixed(2)),
        maxMs: Number(s.maxMs.toFixed(2)),
        lastMs: Number(s.lastMs.toFixed(2)),
      });
    }
  }

  startReporting(intervalMs: number): void {
    this.stopReporting();
    this.reportTimer = setInterval(() => this.report(), intervalMs);
    this.reportTimer.unref();
  }

  stopReporting(): void {
    if (this.reportTimer) {
      clearInterval(this.reportTimer);
      this.reportTimer = undefined;
    }
  }
}
