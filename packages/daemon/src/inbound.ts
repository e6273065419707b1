/**
 * Inbound queue between connection receive paths and the host pump.
 *
 * Producers are socket callbacks; the only consumer is HostPump.drain().
 */

import type { InboundEnvelope } from '@hostbridge/protocol';
import type { ConnectionInfo } from './context.js';

export type StatusLevel = 'debug' | 'info' | 'warn' | 'error';

export type InboundMessage =
  | { kind: 'json'; connection: ConnectionInfo; envelope: InboundEnvelope; receivedAt: number }
  | { kind: 'error'; text: string; connectionId?: string }
  | { kind: 'connect'; connection: ConnectionInfo }
  | { kind: 'disconnect'; connection: ConnectionInfo; reason: string }
  | { kind: 'status'; text: string; level: StatusLevel };

export class InboundQueue {
  private items: InboundMessage[] = [];
  private head = 0;
  private _enqueued = 0;

  get depth(): number {
    return this.items.length - this.head;
  }

  /** Total messages ever enqueued */
  get enqueued(): number {
    return this._enqueued;
  }

  enqueue(message: InboundMessage): void {
    this.items.push(message);
    this._enqueued++;
  }

  dequeue(): InboundMessage | undefined {
    if (this.head >= this.items.length) return undefined;
    const message = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return message;
  }

  /** Drop everything still queued. Returns the number dropped. */
  clear(): number {
    const dropped = this.depth;
    this.items = [];
    this.head = 0;
    return dropped;
  }
}
