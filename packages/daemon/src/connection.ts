/**
 * Connection
 * Owns one accepted socket: handshake, frame decoding, keepalive and
 * serialized frame writes. Never touches host state; everything decoded is
 * handed to the owning server through callbacks.
 */

import {
  FrameDecoder,
  HandshakeReader,
  SerialFrameWriter,
  HANDSHAKE_REQUEST,
  HANDSHAKE_RESPONSE,
  closeNotice,
  decodeEnvelope,
  encodeEnvelope,
  encodeFrame,
  generateConnectionId,
  keepaliveReply,
  type DecodeEvent,
  type Envelope,
  type InboundEnvelope,
} from '@hostbridge/protocol';
import { DEFAULT_SERVER_CONFIG } from '@hostbridge/config';
import { NotConnectedError, errorMessage } from '@hostbridge/utils/errors';
import { connectionLog as log } from '@hostbridge/utils/logger';
import type { ConnectionInfo } from './context.js';

export type ConnectionState = 'HANDSHAKING' | 'ACTIVE' | 'CLOSING' | 'CLOSED';

/**
 * The parts of net.Socket a connection relies on.
 */
export interface ConnectionSocket {
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  write(chunk: Buffer, cb: (err?: Error | null) => void): boolean;
  end(): unknown;
  destroy(): unknown;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface ConnectionConfig {
  maxMessageBytes: number;
  maxSyncScanBytes: number;
  handshakeTimeoutMs: number;
  handshakeMaxBytes: number;
  closeTimeoutMs: number;
  /** 0 disables the idle timeout */
  idleTimeoutMs: number;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  maxMessageBytes: DEFAULT_SERVER_CONFIG.maxMessageBytes,
  maxSyncScanBytes: DEFAULT_SERVER_CONFIG.maxSyncScanBytes,
  handshakeTimeoutMs: DEFAULT_SERVER_CONFIG.handshakeTimeoutMs,
  handshakeMaxBytes: DEFAULT_SERVER_CONFIG.handshakeMaxBytes,
  closeTimeoutMs: DEFAULT_SERVER_CONFIG.closeTimeoutMs,
  idleTimeoutMs: DEFAULT_SERVER_CONFIG.idleTimeoutMs,
};

export interface ConnectionCallbacks {
  /** Handshake completed; the connection may now be listed */
  onActive?: (connection: Connection) => void;
  /** A decoded frame payload arrived */
  onEnvelope?: (connection: Connection, envelope: InboundEnvelope, receivedAt: number) => void;
  /** Connection-scoped protocol failure (the connection is closed afterwards) */
  onProtocolError?: (connection: Connection, error: Error) => void;
  /** Handshake failed; the connection never became active */
  onHandshakeFailed?: (connection: Connection, reason: string) => void;
  /** An active connection went away */
  onClose?: (connection: Connection, reason: string) => void;
}

export class Connection {
  readonly id: string;
  readonly createdAt: number;
  readonly remoteAddress?: string;
  readonly remotePort?: number;

  private _state: ConnectionState = 'HANDSHAKING';
  private readonly config: ConnectionConfig;
  private readonly decoder: FrameDecoder;
  private readonly handshake: HandshakeReader;
  private readonly writer: SerialFrameWriter;
  private handshakeTimer?: NodeJS.Timeout;
  private idleTimer?: NodeJS.Timeout;
  private lastActivity: number;
  private wasActive = false;
  private closeReason = 'socket closed';

  constructor(
    private readonly socket: ConnectionSocket,
    config: Partial<ConnectionConfig> = {},
    private readonly callbacks: ConnectionCallbacks = {}
  ) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
    this.id = generateConnectionId();
    this.createdAt = Date.now();
    this.lastActivity = this.createdAt;
    this.remoteAddress = socket.remoteAddress;
    this.remotePort = socket.remotePort;

    this.decoder = new FrameDecoder({
      maxMessageBytes: this.config.maxMessageBytes,
      maxSyncScanBytes: this.config.maxSyncScanBytes,
    });
    this.handshake = new HandshakeReader(HANDSHAKE_REQUEST, this.config.handshakeMaxBytes);
    this.writer = new SerialFrameWriter(socket);

    this.socket.on('data', (data) => this.handleData(data));
    this.socket.on('close', () => this.handleClose());
    this.socket.on('error', (err) => this.handleError(err));

    this.handshakeTimer = setTimeout(() => {
      this.failHandshake(`timeout after ${this.config.handshakeTimeoutMs}ms`);
    }, this.config.handshakeTimeoutMs);
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** True while the connection is active and writable */
  get alive(): boolean {
    return this._state === 'ACTIVE';
  }

  get info(): ConnectionInfo {
    return {
      id: this.id,
      remoteAddress: this.remoteAddress,
      remotePort: this.remotePort,
      createdAt: this.createdAt,
    };
  }

  get pendingWrites(): number {
    return this.writer.pending;
  }

  /**
   * Send one envelope as a single frame. A failed write tears the connection down.
   */
  async send(envelope: Envelope): Promise<void> {
    if (this._state !== 'ACTIVE') {
      throw new NotConnectedError(`Connection ${this.id} is ${this._state.toLowerCase()}`);
    }
    const frame = encodeEnvelope(envelope, this.config.maxMessageBytes);
    try {
      await this.writer.write(frame);
    } catch (err) {
      this.destroy(`write failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /**
   * Graceful close: best-effort close notice bounded by closeTimeoutMs, then end.
   */
  async close(reason = 'closed'): Promise<void> {
    if (this._state === 'CLOSED' || this._state === 'CLOSING') return;

    if (this._state === 'HANDSHAKING') {
      this.destroy(reason);
      return;
    }

    this._state = 'CLOSING';
    this.closeReason = reason;
    this.clearTimers();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.config.closeTimeoutMs);
    });
    const notice = this.writer.write(encodeEnvelope(closeNotice(reason))).catch((err: unknown) => {
      log.debug('Close notice not delivered', { connectionId: this.id, error: errorMessage(err) });
    });

    await Promise.race([notice, timeout]);
    clearTimeout(timer);
    this.socket.end();
    this.destroy(reason);
  }

  /**
   * Tear down immediately.
   */
  destroy(reason = 'destroyed'): void {
    if (this._state === 'CLOSED') return;
    if (this._state !== 'CLOSING') this.closeReason = reason;
    this.socket.destroy();
    this.handleClose();
  }

  private handleData(data: Buffer): void {
    if (this._state === 'CLOSED') return;
    this.lastActivity = Date.now();

    if (this._state === 'HANDSHAKING') {
      const result = this.handshake.push(data);
      if (result.status === 'pending') return;
      if (result.status === 'failed') {
        this.failHandshake(result.reason);
        return;
      }
      this.activate();
      if (result.rest.length > 0) {
        this.processData(result.rest);
      }
      return;
    }

    this.processData(data);
  }

  private activate(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = undefined;
    }
    this._state = 'ACTIVE';
    this.wasActive = true;
    this.writeRaw(Buffer.from(HANDSHAKE_RESPONSE, 'utf-8'));
    log.info('Handshake completed', { connectionId: this.id, remote: this.remoteAddress });
    this.startIdleTimer();
    this.callbacks.onActive?.(this);
  }

  private processData(data: Buffer): void {
    let events: DecodeEvent[];
    try {
      events = this.decoder.push(data);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.warn('Protocol error, closing connection', { connectionId: this.id, error: error.message });
      this.callbacks.onProtocolError?.(this, error);
      this.destroy(`protocol error: ${error.message}`);
      return;
    }

    const receivedAt = Date.now();
    for (const event of events) {
      // A callback may have closed us mid-batch
      if (this._state !== 'ACTIVE') return;
      this.handleEvent(event, receivedAt);
    }
  }

  private handleEvent(event: DecodeEvent, receivedAt: number): void {
    switch (event.type) {
      case 'frame':
        this.callbacks.onEnvelope?.(this, decodeEnvelope(event.payload), receivedAt);
        break;

      case 'keepalive': {
        const reply = keepaliveReply(event.token);
        if (reply) {
          this.writeRaw(event.framed ? encodeFrame(reply) : Buffer.from(reply, 'utf-8'));
        }
        break;
      }

      case 'notice':
        if (event.kind === 'discarded') {
          log.debug(event.detail, { connectionId: this.id });
        } else {
          log.warn(event.detail, { connectionId: this.id, kind: event.kind });
        }
        break;
    }
  }

  /** Unframed writes (handshake response, keepalive) still go through the serial writer. */
  private writeRaw(data: Buffer): void {
    this.writer.write(data).catch((err: unknown) => {
      this.destroy(`write failed: ${errorMessage(err)}`);
    });
  }

  private failHandshake(reason: string): void {
    if (this._state !== 'HANDSHAKING') return;
    log.warn('Handshake failed', { connectionId: this.id, remote: this.remoteAddress, reason });
    this.callbacks.onHandshakeFailed?.(this, reason);
    this.destroy(`handshake failed: ${reason}`);
  }

  private startIdleTimer(): void {
    if (this.config.idleTimeoutMs <= 0) return;
    const checkEvery = Math.max(10, Math.floor(this.config.idleTimeoutMs / 4));
    this.idleTimer = setInterval(() => {
      if (Date.now() - this.lastActivity >= this.config.idleTimeoutMs) {
        log.info('Closing idle connection', { connectionId: this.id, idleTimeoutMs: this.config.idleTimeoutMs });
        void this.close('idle timeout');
      }
    }, checkEvery);
    this.idleTimer.unref();
  }

  private clearTimers(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = undefined;
    }
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = undefined;
    }
  }

  private handleError(err: Error): void {
    log.debug('Socket error', { connectionId: this.id, error: err.message });
    this.closeReason = `socket error: ${err.message}`;
  }

  private handleClose(): void {
    if (this._state === 'CLOSED') return;
    this._state = 'CLOSED';
    this.clearTimers();
    this.writer.close();
    this.decoder.reset();

    if (this.wasActive) {
      log.info('Connection closed', { connectionId: this.id, reason: this.closeReason });
      this.callbacks.onClose?.(this, this.closeReason);
    }
  }
}
