/**
 * BridgeClient - hostbridge SDK client
 * @hostbridge/sdk
 *
 * Connects to a host over TCP, correlates requests with responses, keeps the
 * connection alive and answers requests the host sends back.
 */

import net from 'node:net';
import {
  FrameDecoder,
  HandshakeReader,
  PendingRequests,
  SerialFrameWriter,
  ACCESS_RESOURCE_COMMAND,
  HANDSHAKE_REQUEST,
  HANDSHAKE_RESPONSE,
  PING,
  decodeEnvelope,
  encodeEnvelope,
  encodeFrame,
  errorResponse,
  generateRequestId,
  keepaliveReply,
  successResponse,
  type DecodeEvent,
  type Envelope,
  type InboundEnvelope,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@hostbridge/protocol';
import { DEFAULT_CLIENT_CONFIG, type ClientConfig } from '@hostbridge/config';
import {
  CommandFailedError,
  ConnectionError,
  HandshakeError,
  HostBridgeError,
  NotConnectedError,
  TimeoutError,
  errorMessage,
} from '@hostbridge/utils/errors';
import { clientLog, type Logger } from '@hostbridge/utils/logger';
import { parseHostSchema, type HostSchema } from './schema.js';

export type ClientState = 'DISCONNECTED' | 'CONNECTING' | 'HANDSHAKING' | 'CONNECTED' | 'DISCONNECTING';

export type { ClientConfig };

export interface RequestOptions {
  /** Defaults to the client's requestTimeoutMs */
  timeoutMs?: number;
}

/**
 * Handler for a request the host sends to this client.
 */
export type LocalHandler = (parameters: Record<string, unknown>, request: RequestEnvelope) => unknown;

interface HandshakeWaiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

/** How long disconnect() waits for the socket to close before destroying it */
const DISCONNECT_GRACE_MS = 1000;

export class BridgeClient {
  private config: ClientConfig;
  private socket?: net.Socket;
  private writer?: SerialFrameWriter;
  private decoder: FrameDecoder;
  private handshake?: HandshakeReader;
  private waiter?: HandshakeWaiter;
  private connecting?: Promise<void>;

  private _state: ClientState = 'DISCONNECTED';
  private reconnectAttempts = 0;
  private reconnectTimer?: NodeJS.Timeout;
  private keepaliveTimer?: NodeJS.Timeout;
  private _destroyed = false;
  private intentionalClose = false;
  private closeReason = 'connection closed';
  private wasConnected = false;

  private pending = new PendingRequests<ResponseEnvelope>();
  private handlers: Map<string, LocalHandler> = new Map();
  private readonly log: Logger;

  // Event handlers
  onStateChange?: (state: ClientState) => void;
  onError?: (error: Error) => void;
  onConnected?: () => void;
  onDisconnected?: (reason: string) => void;

  constructor(config: Partial<ClientConfig> = {}, logger: Logger = clientLog) {
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };
    this.decoder = new FrameDecoder({ maxMessageBytes: this.config.maxMessageBytes });
    this.log = logger;
  }

  get state(): ClientState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'CONNECTED';
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  /** Requests still waiting for a response */
  get pendingCount(): number {
    return this.pending.size;
  }

  get endpoint(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  /**
   * Connect and complete the handshake. One attempt; a failure rejects and
   * leaves the client DISCONNECTED.
   */
  connect(): Promise<void> {
    if (this._destroyed) {
      return Promise.reject(new HostBridgeError('Client has been destroyed'));
    }
    if (this._state === 'CONNECTED') {
      return Promise.resolve();
    }
    if (this.connecting) {
      return this.connecting;
    }
    if (this._state === 'DISCONNECTING') {
      return Promise.reject(new ConnectionError('client is disconnecting'));
    }

    this.clearReconnectTimer();
    this.connecting = this.open().finally(() => {
      this.connecting = undefined;
    });
    return this.connecting;
  }

  /**
   * Close the connection. Pending requests are left to time out.
   */
  async disconnect(reason = 'client disconnect'): Promise<void> {
    this.clearReconnectTimer();
    const socket = this.socket;
    if (!socket) {
      this.setState('DISCONNECTED');
      return;
    }

    this.intentionalClose = true;
    this.closeReason = reason;
    this.stopKeepalive();
    this.setState('DISCONNECTING');

    const closed = new Promise<void>((resolve) => socket.once('close', () => resolve()));
    const grace = setTimeout(() => socket.destroy(), DISCONNECT_GRACE_MS);
    socket.end();
    await closed;
    clearTimeout(grace);
  }

  /**
   * Permanently destroy the client. Pending requests are cancelled.
   */
  destroy(): void {
    this._destroyed = true;
    this.clearReconnectTimer();
    const cancelled = this.pending.cancelAll('client destroyed');
    if (cancelled > 0) {
      this.log.debug('Cancelled pending requests', { count: cancelled });
    }

    const socket = this.socket;
    if (socket) {
      this.intentionalClose = true;
      this.closeReason = 'client destroyed';
      socket.destroy();
      this.handleDisconnect(socket);
    }
  }

  /**
   * Send a request and wait for its response envelope.
   */
  async request(
    command: string,
    parameters: Record<string, unknown> = {},
    options: RequestOptions = {}
  ): Promise<ResponseEnvelope> {
    const writer = this.writer;
    if (this._state !== 'CONNECTED' || !writer) {
      throw new NotConnectedError();
    }

    const id = generateRequestId();
    const envelope: RequestEnvelope = { id, command, parameters, client_timestamp: Date.now() };
    const frame = encodeEnvelope(envelope, this.config.maxMessageBytes);
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeoutMs;
    const response = this.pending.register(id, command, timeoutMs);

    try {
      await writer.write(frame);
    } catch (err) {
      const error = new ConnectionError(`failed to send ${command}: ${errorMessage(err)}`);
      this.pending.reject(id, error);
      this.dropConnection(`write failed: ${errorMessage(err)}`);
    }
    return response;
  }

  /**
   * Send a request and return its result; a host-side error throws CommandFailedError.
   */
  async invoke(
    command: string,
    parameters: Record<string, unknown> = {},
    options: RequestOptions = {}
  ): Promise<unknown> {
    const response = await this.request(command, parameters, options);
    if (response.status === 'error') {
      throw new CommandFailedError(command, response.error ?? 'Unknown error');
    }
    return response.result;
  }

  /**
   * Fetch the host's tools and resources.
   */
  async getSchema(options: RequestOptions = {}): Promise<HostSchema> {
    return parseHostSchema(await this.invoke('get_schema', {}, options));
  }

  /**
   * Read a resource through the access_resource command.
   */
  accessResource(
    name: string,
    parameters: Record<string, unknown> = {},
    options: RequestOptions = {}
  ): Promise<unknown> {
    return this.invoke(ACCESS_RESOURCE_COMMAND, { resource_name: name, parameters }, options);
  }

  /**
   * Answer host-initiated requests for `command`. Replaces any earlier handler.
   */
  handle(command: string, handler: LocalHandler): void {
    this.handlers.set(command, handler);
  }

  removeHandler(command: string): boolean {
    return this.handlers.delete(command);
  }

  // Private methods

  private setState(state: ClientState): void {
    if (this._state === state) return;
    this._state = state;
    if (this.onStateChange) {
      this.onStateChange(state);
    }
  }

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (err?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.waiter = undefined;
        if (err) reject(err);
        else resolve();
      };

      this.intentionalClose = false;
      this.closeReason = 'connection closed';
      this.wasConnected = false;
      this.decoder.reset();
      this.handshake = new HandshakeReader(HANDSHAKE_RESPONSE);
      this.setState('CONNECTING');

      const socket = net.createConnection({ host: this.config.host, port: this.config.port });
      this.socket = socket;
      this.writer = new SerialFrameWriter(socket);
      this.waiter = { resolve: () => settle(), reject: (err) => settle(err) };

      const fail = (err: Error): void => {
        settle(err);
        socket.destroy();
        this.handleDisconnect(socket);
      };

      timer = setTimeout(() => {
        fail(new TimeoutError(`connect to ${this.endpoint}`, this.config.connectTimeoutMs));
      }, this.config.connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.setNoDelay(true);
        this.setState('HANDSHAKING');
        timer = setTimeout(() => {
          fail(new HandshakeError(`no response within ${this.config.handshakeTimeoutMs}ms`));
        }, this.config.handshakeTimeoutMs);
        this.writeRaw(Buffer.from(HANDSHAKE_REQUEST, 'utf-8'));
      });

      socket.on('data', (data) => this.handleData(socket, data));

      socket.on('error', (err) => {
        if (this._state === 'CONNECTING') {
          settle(new ConnectionError(`Failed to connect to ${this.endpoint}: ${err.message}`));
          return;
        }
        this.closeReason = `socket error: ${err.message}`;
        this.handleError(err);
      });

      socket.on('close', () => {
        settle(new ConnectionError(`connection to ${this.endpoint} closed during handshake`));
        this.handleDisconnect(socket);
      });
    });
  }

  private handleData(socket: net.Socket, data: Buffer): void {
    if (socket !== this.socket) return;

    if (this._state === 'HANDSHAKING') {
      const result = this.handshake?.push(data) ?? { status: 'pending' as const };
      if (result.status === 'pending') return;
      if (result.status === 'failed') {
        this.waiter?.reject(new HandshakeError(result.reason));
        socket.destroy();
        return;
      }
      this.handleConnected();
      if (result.rest.length > 0) this.processData(result.rest);
      return;
    }

    if (this._state === 'CONNECTED' || this._state === 'DISCONNECTING') {
      this.processData(data);
    }
  }

  private handleConnected(): void {
    this.reconnectAttempts = 0;
    this.wasConnected = true;
    this.setState('CONNECTED');
    this.log.info('Connected', { endpoint: this.endpoint });
    this.startKeepalive();
    this.waiter?.resolve();
    if (this.onConnected) {
      this.onConnected();
    }
  }

  private processData(data: Buffer): void {
    let events: DecodeEvent[];
    try {
      events = this.decoder.push(data);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.handleError(error);
      this.dropConnection(`protocol error: ${error.message}`);
      return;
    }

    for (const event of events) {
      this.processEvent(event);
    }
  }

  private processEvent(event: DecodeEvent): void {
    switch (event.type) {
      case 'frame':
        this.processEnvelope(decodeEnvelope(event.payload));
        break;

      case 'keepalive': {
        const reply = keepaliveReply(event.token);
        if (reply) {
          this.writeRaw(event.framed ? encodeFrame(reply) : Buffer.from(reply, 'utf-8'));
        }
        break;
      }

      case 'notice':
        this.log.debug(event.detail, { kind: event.kind });
        break;
    }
  }

  private processEnvelope(inbound: InboundEnvelope): void {
    switch (inbound.kind) {
      case 'response':
        if (!this.pending.resolve(inbound.envelope.id, inbound.envelope)) {
          this.log.debug('Dropping unmatched response', { id: inbound.envelope.id });
        }
        break;

      case 'request':
        this.handleRequest(inbound.envelope).catch((err: unknown) => {
          this.log.error('Failed to answer host request', { id: inbound.envelope.id, error: errorMessage(err) });
        });
        break;

      case 'close':
        this.log.info('Host closed the connection', { reason: inbound.envelope.reason });
        this.closeReason = `host closed: ${inbound.envelope.reason}`;
        break;

      case 'invalid':
        this.log.warn('Invalid envelope from host', { id: inbound.id, error: inbound.error });
        break;
    }
  }

  private async handleRequest(request: RequestEnvelope): Promise<void> {
    const handler = this.handlers.get(request.command);
    let response: ResponseEnvelope;

    if (!handler) {
      response = errorResponse(request.id, `Unknown command: ${request.command}`, request.client_timestamp);
    } else {
      try {
        const result: unknown = await handler(request.parameters ?? {}, request);
        response = successResponse(request.id, result, request.client_timestamp);
      } catch (err) {
        response = errorResponse(request.id, errorMessage(err), request.client_timestamp);
      }
    }

    await this.send(response);
  }

  private async send(envelope: Envelope): Promise<void> {
    const writer = this.writer;
    if (!writer || this._state !== 'CONNECTED') {
      throw new NotConnectedError();
    }
    try {
      await writer.write(encodeEnvelope(envelope, this.config.maxMessageBytes));
    } catch (err) {
      this.dropConnection(`write failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /** Unframed writes (handshake, keepalive) share the frame writer */
  private writeRaw(data: Buffer): void {
    const writer = this.writer;
    if (!writer) return;
    writer.write(data).catch((err: unknown) => {
      this.dropConnection(`write failed: ${errorMessage(err)}`);
    });
  }

  private startKeepalive(): void {
    this.stopKeepalive();
    this.writeRaw(Buffer.from(PING, 'utf-8'));
    if (this.config.keepaliveIntervalMs <= 0) return;

    this.keepaliveTimer = setInterval(() => {
      if (this._state !== 'CONNECTED') return;
      this.writeRaw(Buffer.from(PING, 'utf-8'));
    }, this.config.keepaliveIntervalMs);
    this.keepaliveTimer.unref();
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = undefined;
    }
  }

  /** Treat the current connection as lost */
  private dropConnection(reason: string): void {
    const socket = this.socket;
    if (!socket) return;
    this.closeReason = reason;
    socket.destroy();
    this.handleDisconnect(socket);
  }

  private handleDisconnect(socket: net.Socket): void {
    if (socket !== this.socket) return;

    this.stopKeepalive();
    this.writer?.close();
    this.writer = undefined;
    this.socket = undefined;
    this.handshake = undefined;
    this.decoder.reset();

    const reason = this.closeReason;
    const wasConnected = this.wasConnected;
    this.wasConnected = false;
    this.setState('DISCONNECTED');

    if (!wasConnected) return;

    if (this.intentionalClose) {
      this.log.info('Disconnected', { reason });
    } else {
      // Pending requests stay registered and time out on their own
      this.log.warn('Connection lost', { reason, pending: this.pending.size });
    }
    if (this.onDisconnected) {
      this.onDisconnected(reason);
    }

    if (!this.intentionalClose && !this._destroyed && this.config.reconnect) {
      this.scheduleReconnect();
    }
  }

  private handleError(error: Error): void {
    this.log.debug('Client error', { error: error.message });
    if (this.onError) {
      this.onError(error);
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      this.log.error('Max reconnect attempts reached, giving up', {
        attempts: this.reconnectAttempts,
        endpoint: this.endpoint,
      });
      return;
    }

    this.reconnectAttempts++;
    const delay = this.config.reconnectDelayMs * this.reconnectAttempts;
    this.log.info('Reconnecting', { attempt: this.reconnectAttempts, delayMs: delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((err: unknown) => {
        this.log.warn('Reconnect attempt failed', { attempt: this.reconnectAttempts, error: errorMessage(err) });
        if (!this._destroyed) this.scheduleReconnect();
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }
}
