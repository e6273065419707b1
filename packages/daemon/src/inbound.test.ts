import { describe, it, expect } from 'vitest';
import { InboundQueue, type InboundMessage } from './inbound.js';

const status = (text: string): InboundMessage => ({ kind: 'status', text, level: 'info' });

describe('InboundQueue', () => {
  it('is first in, first out', () => {
    const queue = new InboundQueue();
    queue.enqueue(status('a'));
    queue.enqueue(status('b'));

    expect(queue.depth).toBe(2);
    expect(queue.dequeue()).toEqual(status('a'));
    expect(queue.dequeue()).toEqual(status('b'));
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.depth).toBe(0);
  });

  it('keeps order across compaction', () => {
    const queue = new InboundQueue();
    for (let i = 0; i < 3000; i++) queue.enqueue(status(String(i)));

    const seen: string[] = [];
    for (let i = 0; i < 2000; i++) {
      const message = queue.dequeue();
      if (message?.kind === 'status') seen.push(message.text);
    }
    for (let i = 3000; i < 3100; i++) queue.enqueue(status(String(i)));

    expect(seen[1999]).toBe('1999');
    expect(queue.depth).toBe(1100);
    expect(queue.dequeue()).toEqual(status('2000'));
    expect(queue.enqueued).toBe(3100);
  });

  it('clear reports how many messages were dropped', () => {
    const queue = new InboundQueue();
    queue.enqueue(status('a'));
    queue.enqueue(status('b'));
    queue.dequeue();

    expect(queue.clear()).toBe(1);
    expect(queue.depth).toBe(0);
  });
});
