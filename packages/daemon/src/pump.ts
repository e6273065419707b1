/**
 * Host pump
 *
 * Drains the inbound queue on the host's own turn. Each call is bounded by a
 * message count and a time budget; whatever is left waits for the next call.
 */

import { performance } from 'node:perf_hooks';
import { DEFAULT_PUMP_CONFIG } from '@hostbridge/config';
import { errorMessage } from '@hostbridge/utils/errors';
import { pumpLog, type Logger } from '@hostbridge/utils/logger';
import type { InboundMessage, InboundQueue } from './inbound.js';

export interface DrainBudget {
  maxMessages?: number;
  maxMs?: number;
}

export interface DrainStats {
  processed: number;
  remaining: number;
  elapsedMs: number;
  /** True when the call was refused because a drain was already running */
  skipped: boolean;
}

export type MessageProcessor = (message: InboundMessage) => void | Promise<void>;

export interface HostPumpOptions {
  maxMessagesPerDrain?: number;
  maxDrainMs?: number;
  queueHighWaterMark?: number;
  rateHighWaterMark?: number;
  rateWindowMs?: number;
  /** Monotonic clock in ms (default: performance.now) */
  now?: () => number;
  logger?: Logger;
}

interface RateSample {
  at: number;
  count: number;
}

export class HostPump {
  private draining = false;
  private depthWarned = false;
  private rateWarned = false;
  private samples: RateSample[] = [];
  private _processedTotal = 0;

  private readonly maxMessages: number;
  private readonly maxMs: number;
  private readonly queueHighWaterMark: number;
  private readonly rateHighWaterMark: number;
  private readonly rateWindowMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly queue: InboundQueue,
    private readonly processor: MessageProcessor,
    options: HostPumpOptions = {}
  ) {
    this.maxMessages = options.maxMessagesPerDrain ?? DEFAULT_PUMP_CONFIG.maxMessagesPerDrain;
    this.maxMs = options.maxDrainMs ?? DEFAULT_PUMP_CONFIG.maxDrainMs;
    this.queueHighWaterMark = options.queueHighWaterMark ?? DEFAULT_PUMP_CONFIG.queueHighWaterMark;
    this.rateHighWaterMark = options.rateHighWaterMark ?? DEFAULT_PUMP_CONFIG.rateHighWaterMark;
    this.rateWindowMs = options.rateWindowMs ?? DEFAULT_PUMP_CONFIG.rateWindowMs;
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger ?? pumpLog;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  get processedTotal(): number {
    return this._processedTotal;
  }

  /**
   * Process queued messages, one at a time, until the budget is used up.
   */
  async drain(budget: DrainBudget = {}): Promise<DrainStats> {
    if (this.draining) {
      return { processed: 0, remaining: this.queue.depth, elapsedMs: 0, skipped: true };
    }

    this.draining = true;
    const maxMessages = budget.maxMessages ?? this.maxMessages;
    const maxMs = budget.maxMs ?? this.maxMs;
    const started = this.now();
    let processed = 0;

    try {
      this.checkDepth();

      while (processed < maxMessages && this.now() - started < maxMs) {
        const message = this.queue.dequeue();
        if (!message) break;
        await this.process(message);
        processed++;
      }
    } finally {
      this.draining = false;
    }

    const finished = this.now();
    this._processedTotal += processed;
    this.checkRate(finished, processed);
    this.checkDepth();

    return { processed, remaining: this.queue.depth, elapsedMs: finished - started, skipped: false };
  }

  private async process(message: InboundMessage): Promise<void> {
    try {
      await this.processor(message);
    } catch (err) {
      this.log.error('Error processing inbound message', {
        kind: message.kind,
        error: errorMessage(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
  }

  private checkDepth(): void {
    const depth = this.queue.depth;
    if (depth >= this.queueHighWaterMark) {
      if (!this.depthWarned) {
        this.depthWarned = true;
        this.log.warn('Inbound queue above high-water mark', { depth, highWaterMark: this.queueHighWaterMark });
      }
    } else {
      this.depthWarned = false;
    }
  }

  private checkRate(at: number, processed: number): void {
    if (processed > 0) this.samples.push({ at, count: processed });
    const cutoff = at - this.rateWindowMs;
    while (this.samples.length > 0 && this.samples[0].at <= cutoff) {
      this.samples.shift();
    }

    const total = this.samples.reduce((sum, sample) => sum + sample.count, 0);
    const rate = total / (this.rateWindowMs / 1000);
    if (rate > this.rateHighWaterMark) {
      if (!this.rateWarned) {
        this.rateWarned = true;
        this.log.warn('Inbound message rate above high-water mark', {
          ratePerSec: Math.round(rate),
          highWaterMark: this.rateHighWaterMark,
          windowMs: this.rateWindowMs,
        });
      }
    } else {
      this.rateWarned = false;
    }
  }
}
