/**
 * Frame encoding/decoding for the hostbridge wire protocol.
 *
 * Wire format:
 * - 1 byte: start marker (0x02)
 * - 4 bytes: little-endian payload length
 * - N bytes: UTF-8 JSON payload
 * - 1 byte: end marker (0x03)
 *
 * Keepalive tokens (PING/PONG) travel between frames as plain ASCII.
 */

import { FrameSyncError, FrameTooLargeError, ProtocolError } from '@hostbridge/utils/errors';
import { KEEPALIVE_TOKENS, type KeepaliveToken } from './tokens.js';

export const START_MARKER = 0x02;
export const END_MARKER = 0x03;
export const HEADER_SIZE = 5; // start marker + uint32 length
export const TRAILER_SIZE = 1;

export const DEFAULT_MAX_MESSAGE_BYTES = 10 * 1024 * 1024; // 10 MiB
export const DEFAULT_MAX_SYNC_SCAN_BYTES = 1000;

const CLOSE_BRACE = 0x7d; // '}'

export type DecodeNoticeKind = 'discarded' | 'invalid-length' | 'corrupt' | 'recovered';

export type DecodeEvent =
  | { type: 'frame'; payload: Buffer; recovered: boolean }
  | { type: 'keepalive'; token: KeepaliveToken; framed: boolean }
  | { type: 'notice'; kind: DecodeNoticeKind; detail: string };

export interface FrameDecoderOptions {
  /** Largest accepted payload (default: 10 MiB) */
  maxMessageBytes?: number;
  /** Stray bytes tolerated while looking for a start marker (default: 1000) */
  maxSyncScanBytes?: number;
}

/**
 * Encode a payload into one contiguous frame buffer.
 */
export function encodeFrame(payload: Buffer | string, maxMessageBytes = DEFAULT_MAX_MESSAGE_BYTES): Buffer {
  const data = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;

  if (data.length === 0) {
    throw new ProtocolError('Cannot encode an empty frame');
  }
  if (data.length > maxMessageBytes) {
    throw new FrameTooLargeError(data.length, maxMessageBytes);
  }

  const frame = Buffer.allocUnsafe(HEADER_SIZE + data.length + TRAILER_SIZE);
  frame.writeUInt8(START_MARKER, 0);
  frame.writeUInt32LE(data.length, 1);
  data.copy(frame, HEADER_SIZE);
  frame.writeUInt8(END_MARKER, HEADER_SIZE + data.length);
  return frame;
}

/**
 * Serialize an envelope as JSON and frame it.
 */
export function encodeEnvelope(envelope: object, maxMessageBytes = DEFAULT_MAX_MESSAGE_BYTES): Buffer {
  return encodeFrame(JSON.stringify(envelope), maxMessageBytes);
}

/**
 * A payload missing its end marker is still accepted when it closes a JSON
 * object and parses.
 */
function isCompleteJsonObject(payload: Buffer): boolean {
  const text = payload.toString('utf-8').trimEnd();
  if (!text.endsWith('}')) return false;
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

type TokenMatch = KeepaliveToken | 'partial' | null;

function matchKeepalive(buffer: Buffer): TokenMatch {
  for (const token of KEEPALIVE_TOKENS) {
    if (buffer.length >= token.length) {
      if (buffer.toString('latin1', 0, token.length) === token) return token;
    } else if (token.startsWith(buffer.toString('latin1'))) {
      return 'partial';
    }
  }
  return null;
}

/**
 * Streaming frame decoder.
 *
 * Bytes are pushed as they arrive; complete frames, keepalive tokens and
 * recovery notices come back in wire order. A frame is only emitted once all
 * of its bytes are buffered.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private skipped = 0;
  private readonly maxMessageBytes: number;
  private readonly maxSyncScanBytes: number;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxSyncScanBytes = options.maxSyncScanBytes ?? DEFAULT_MAX_SYNC_SCAN_BYTES;
  }

  /**
   * Get current unread bytes in buffer.
   */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * Push data into the decoder and extract complete events.
   *
   * @throws FrameSyncError when no start marker shows up within the scan budget
   */
  push(data: Buffer): DecodeEvent[] {
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);
    const events: DecodeEvent[] = [];

    while (this.buffer.length > 0) {
      if (this.buffer[0] === START_MARKER) {
        this.flushSkipped(events);
        if (!this.readFrame(events)) break;
        continue;
      }

      const token = matchKeepalive(this.buffer);
      if (token === 'partial') break;
      if (token) {
        this.flushSkipped(events);
        this.consume(token.length);
        events.push({ type: 'keepalive', token, framed: false });
        continue;
      }

      this.consume(1);
      this.skipped++;
      if (this.skipped > this.maxSyncScanBytes) {
        const scanned = this.skipped;
        this.reset();
        throw new FrameSyncError(scanned);
      }
    }

    return events;
  }

  /**
   * Reset decoder state.
   */
  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.skipped = 0;
  }

  /** Returns false when more bytes are needed. */
  private readFrame(events: DecodeEvent[]): boolean {
    if (this.buffer.length < HEADER_SIZE) return false;

    const length = this.buffer.readUInt32LE(1);
    if (length === 0 || length > this.maxMessageBytes) {
      events.push({
        type: 'notice',
        kind: 'invalid-length',
        detail: `Invalid frame length ${length} (max ${this.maxMessageBytes})`,
      });
      this.consume(1);
      return true;
    }

    const payloadEnd = HEADER_SIZE + length;
    if (this.buffer.length < payloadEnd + TRAILER_SIZE) return false;

    const payload = Buffer.from(this.buffer.subarray(HEADER_SIZE, payloadEnd));
    const trailer = this.buffer[payloadEnd];

    if (trailer === END_MARKER) {
      this.consume(payloadEnd + TRAILER_SIZE);
      this.emitPayload(events, payload, false);
      return true;
    }

    // Only a stray `}` stands in for the end marker
    if (trailer === CLOSE_BRACE && isCompleteJsonObject(payload)) {
      events.push({
        type: 'notice',
        kind: 'recovered',
        detail: `End marker missing (got 0x7d), accepted JSON payload of ${length} bytes`,
      });
      this.consume(payloadEnd + TRAILER_SIZE);
      this.emitPayload(events, payload, true);
      return true;
    }

    events.push({
      type: 'notice',
      kind: 'corrupt',
      detail: `End marker missing (got 0x${trailer.toString(16).padStart(2, '0')}), dropped ${length} byte payload`,
    });
    this.consume(payloadEnd);
    return true;
  }

  private emitPayload(events: DecodeEvent[], payload: Buffer, recovered: boolean): void {
    if (payload.length === 4) {
      const text = payload.toString('latin1');
      const token = KEEPALIVE_TOKENS.find((t) => t === text);
      if (token) {
        events.push({ type: 'keepalive', token, framed: true });
        return;
      }
    }
    events.push({ type: 'frame', payload, recovered });
  }

  private flushSkipped(events: DecodeEvent[]): void {
    if (this.skipped === 0) return;
    events.push({ type: 'notice', kind: 'discarded', detail: `Discarded ${this.skipped} stray bytes` });
    this.skipped = 0;
  }

  private consume(count: number): void {
    this.buffer = this.buffer.subarray(count);
  }
}
