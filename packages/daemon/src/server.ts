/**
 * hostbridge transport server
 *
 * Accepts TCP connections, runs the handshake and receive path for each one
 * and queues everything decoded for the host pump. Host-visible work (events,
 * command dispatch) only happens inside drain().
 */

import net from 'node:net';
import {
  PendingRequests,
  errorResponse,
  generateRequestId,
  type Envelope,
  type InboundEnvelope,
  type ResponseEnvelope,
} from '@hostbridge/protocol';
import { DEFAULT_PUMP_CONFIG, DEFAULT_SERVER_CONFIG, type PumpConfig, type ServerConfig } from '@hostbridge/config';
import { ConnectionError, NotConnectedError, errorMessage } from '@hostbridge/utils/errors';
import { serverLog as log } from '@hostbridge/utils/logger';
import { GET_SCHEMA_COMMAND, registerBuiltinCommands } from './builtin-commands.js';
import { Connection } from './connection.js';
import type { CallPeer, ConnectionInfo, InvocationContext } from './context.js';
import { Dispatcher } from './dispatcher.js';
import { InboundQueue, type InboundMessage } from './inbound.js';
import { ExecutionMonitor } from './monitor.js';
import { HostPump, type DrainBudget, type DrainStats } from './pump.js';
import { CommandRegistry } from './registry.js';

export interface ServerAddress {
  host: string;
  port: number;
}

/**
 * Callbacks registered at construction. Connect, disconnect, message and error
 * callbacks run from drain(), on the host's turn.
 */
export interface ServerEvents {
  onStarted?: (address: ServerAddress) => void;
  onStopped?: (reason: string) => void;
  onClientConnected?: (connection: ConnectionInfo) => void;
  onClientDisconnected?: (connection: ConnectionInfo, reason: string) => void;
  onMessage?: (connection: ConnectionInfo, envelope: InboundEnvelope) => void;
  onError?: (message: string, connectionId?: string) => void;
}

export interface BridgeServerOptions {
  config?: Partial<ServerConfig>;
  pump?: Partial<PumpConfig>;
  registry?: CommandRegistry;
  monitor?: ExecutionMonitor;
  events?: ServerEvents;
  /** Register get_schema and get_metrics (default: true) */
  builtinCommands?: boolean;
  /** Pump clock, for tests */
  now?: () => number;
}

export interface BroadcastResult {
  sent: number;
  failed: string[];
}

export class BridgeServer {
  readonly registry: CommandRegistry;
  readonly monitor: ExecutionMonitor;

  private server?: net.Server;
  private readonly config: ServerConfig;
  private readonly events: ServerEvents;
  private readonly queue = new InboundQueue();
  private readonly pump: HostPump;
  private readonly dispatcher: Dispatcher;
  private connections: Map<string, Connection> = new Map();
  private handshaking: Set<Connection> = new Set();
  private pendingRequests = new PendingRequests<ResponseEnvelope>();
  private running = false;
  private stopping = false;
  private boundAddress?: ServerAddress;
  private readonly reportIntervalMs: number;

  constructor(options: BridgeServerOptions = {}) {
    this.config = { ...DEFAULT_SERVER_CONFIG, ...options.config };
    const pumpConfig: PumpConfig = { ...DEFAULT_PUMP_CONFIG, ...options.pump };
    this.events = options.events ?? {};
    this.registry = options.registry ?? new CommandRegistry();
    this.monitor = options.monitor ?? new ExecutionMonitor();
    this.reportIntervalMs = pumpConfig.reportIntervalMs;
    if (options.builtinCommands !== false && !this.registry.lookup(GET_SCHEMA_COMMAND)) {
      registerBuiltinCommands(this.registry, this.monitor);
    }
    this.dispatcher = new Dispatcher(this.registry, {
      slowCommandWarnMs: pumpConfig.slowCommandWarnMs,
      monitor: this.monitor,
    });
    this.pump = new HostPump(this.queue, (message) => this.processMessage(message), {
      ...pumpConfig,
      now: options.now,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get address(): ServerAddress | undefined {
    return this.boundAddress;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  get queueDepth(): number {
    return this.queue.depth;
  }

  listConnections(): ConnectionInfo[] {
    return Array.from(this.connections.values()).map((connection) => connection.info);
  }

  /**
   * Bind and listen. A bind failure rejects.
   */
  start(): Promise<ServerAddress> {
    if (this.running && this.boundAddress) {
      return Promise.resolve(this.boundAddress);
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.accept(socket));

      const onListenError = (err: Error): void => {
        server.close();
        reject(new ConnectionError(`Failed to bind ${this.config.host}:${this.config.port}: ${err.message}`));
      };
      server.once('error', onListenError);

      server.listen(this.config.port, this.config.host, () => {
        server.off('error', onListenError);
        server.on('error', (err) => {
          log.error('Listener error', { error: err.message });
          this.queue.enqueue({ kind: 'error', text: `Listener error: ${err.message}` });
        });

        const bound = server.address();
        const port = bound !== null && typeof bound === 'object' ? bound.port : this.config.port;
        this.server = server;
        this.running = true;
        this.stopping = false;
        this.boundAddress = { host: this.config.host, port };

        if (this.reportIntervalMs > 0) {
          this.monitor.startReporting(this.reportIntervalMs);
        }
        log.info('Server started', { host: this.config.host, port });
        this.queue.enqueue({ kind: 'status', text: `Listening on ${this.config.host}:${port}`, level: 'info' });
        this.safeEmit('onStarted', () => this.events.onStarted?.({ host: this.config.host, port }));
        resolve({ host: this.config.host, port });
      });
    });
  }

  /**
   * Stop listening, close every connection with a best-effort notice and
   * clear all state.
   */
  async stop(reason = 'server stopping'): Promise<void> {
    if (!this.running || this.stopping) return;
    this.stopping = true;
    log.info('Stopping server', { reason, connections: this.connections.size });

    const server = this.server;
    const closed = new Promise<void>((resolve) => {
      if (!server) {
        resolve();
        return;
      }
      server.close(() => resolve());
    });

    const all = [...this.connections.values(), ...this.handshaking];
    await Promise.all(all.map((connection) => connection.close(reason)));
    await closed;

    this.connections.clear();
    this.handshaking.clear();
    this.monitor.stopReporting();
    const cancelled = this.pendingRequests.cancelAll(reason);
    const dropped = this.queue.clear();
    if (cancelled > 0 || dropped > 0) {
      log.info('Discarded in-flight work on stop', { cancelledRequests: cancelled, droppedMessages: dropped });
    }

    this.server = undefined;
    this.boundAddress = undefined;
    this.running = false;
    this.stopping = false;
    log.info('Server stopped', { reason });
    this.safeEmit('onStopped', () => this.events.onStopped?.(reason));
  }

  /**
   * Drain the inbound queue. Call once per host tick.
   */
  drain(budget?: DrainBudget): Promise<DrainStats> {
    return this.pump.drain(budget);
  }

  /**
   * Send an envelope to one connection.
   */
  async send(connectionId: string, envelope: Envelope): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      throw new NotConnectedError(`Unknown connection: ${connectionId}`);
    }
    await connection.send(envelope);
  }

  /**
   * Send to every active connection. A failing connection is removed and the
   * broadcast carries on.
   */
  async broadcast(envelope: Envelope): Promise<BroadcastResult> {
    const snapshot = Array.from(this.connections.values());
    const results = await Promise.allSettled(snapshot.map((connection) => connection.send(envelope)));

    const failed: string[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const connection = snapshot[index];
        failed.push(connection.id);
        log.warn('Broadcast send failed', { connectionId: connection.id, error: errorMessage(result.reason) });
        connection.destroy(`broadcast failed: ${errorMessage(result.reason)}`);
      }
    });

    return { sent: snapshot.length - failed.length, failed };
  }

  /**
   * Ask a connected client to run one of its local handlers.
   */
  async request(
    connectionId: string,
    command: string,
    parameters: Record<string, unknown> = {},
    timeoutMs: number = this.config.requestTimeoutMs
  ): Promise<ResponseEnvelope> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      throw new NotConnectedError(`Unknown connection: ${connectionId}`);
    }

    const id = generateRequestId();
    const response = this.pendingRequests.register(id, command, timeoutMs);
    try {
      await connection.send({ id, command, parameters, client_timestamp: Date.now() });
    } catch (err) {
      this.pendingRequests.reject(id, err instanceof Error ? err : new Error(String(err)));
    }
    return response;
  }

  private accept(socket: net.Socket): void {
    if (this.stopping) {
      socket.destroy();
      return;
    }
    socket.setNoDelay(true);

    const connection = new Connection(socket, this.config, {
      onActive: (conn) => {
        this.handshaking.delete(conn);
        this.connections.set(conn.id, conn);
        this.queue.enqueue({ kind: 'connect', connection: conn.info });
      },
      onHandshakeFailed: (conn, reason) => {
        this.handshaking.delete(conn);
        log.debug('Dropped connection before handshake', { remote: conn.remoteAddress, reason });
      },
      onEnvelope: (conn, envelope, receivedAt) => this.receive(conn, envelope, receivedAt),
      onProtocolError: (conn, error) => {
        this.queue.enqueue({ kind: 'error', text: error.message, connectionId: conn.id });
      },
      onClose: (conn, reason) => {
        this.handshaking.delete(conn);
        if (this.connections.delete(conn.id) && !this.stopping) {
          this.queue.enqueue({ kind: 'disconnect', connection: conn.info, reason });
        }
      },
    });

    this.handshaking.add(connection);
    log.debug('Accepted connection', { connectionId: connection.id, remote: connection.remoteAddress });
  }

  /**
   * Receive path. Responses to server-initiated requests settle here so a
   * handler awaiting one does not wait on its own drain; everything else is
   * queued for the pump.
   */
  private receive(connection: Connection, envelope: InboundEnvelope, receivedAt: number): void {
    if (envelope.kind === 'response') {
      if (!this.pendingRequests.resolve(envelope.envelope.id, envelope.envelope)) {
        log.debug('Dropping unmatched response', { connectionId: connection.id, id: envelope.envelope.id });
      }
      return;
    }
    this.queue.enqueue({ kind: 'json', connection: connection.info, envelope, receivedAt });
  }

  private async processMessage(message: InboundMessage): Promise<void> {
    switch (message.kind) {
      case 'status':
        log[message.level](message.text);
        return;

      case 'error':
        log.warn('Connection error', { connectionId: message.connectionId, error: message.text });
        this.safeEmit('onError', () => this.events.onError?.(message.text, message.connectionId));
        return;

      case 'connect':
        log.info('Client connected', { connectionId: message.connection.id, remote: message.connection.remoteAddress });
        this.safeEmit('onClientConnected', () => this.events.onClientConnected?.(message.connection));
        return;

      case 'disconnect':
        log.info('Client disconnected', { connectionId: message.connection.id, reason: message.reason });
        this.safeEmit('onClientDisconnected', () =>
          this.events.onClientDisconnected?.(message.connection, message.reason)
        );
        return;

      case 'json':
        await this.processEnvelope(message.connection, message.envelope, message.receivedAt);
        return;
    }
  }

  private async processEnvelope(info: ConnectionInfo, envelope: InboundEnvelope, receivedAt: number): Promise<void> {
    this.safeEmit('onMessage', () => this.events.onMessage?.(info, envelope));

    switch (envelope.kind) {
      case 'close':
        log.info('Client sent close notice', { connectionId: info.id, reason: envelope.envelope.reason });
        return;

      case 'response':
        // Settled on receipt
        return;

      case 'invalid':
        log.warn('Invalid request', { connectionId: info.id, id: envelope.id, error: envelope.error });
        await this.reply(info.id, errorResponse(envelope.id, envelope.error, envelope.clientTimestamp));
        return;

      case 'request': {
        const request = envelope.envelope;
        const callPeer: CallPeer = (command, parameters, timeoutMs) =>
          this.request(info.id, command, parameters, timeoutMs);
        const ctx: InvocationContext = {
          requestId: request.id,
          command: request.command,
          connectionId: info.id,
          remoteAddress: info.remoteAddress,
          receivedAt,
          callPeer,
        };
        const response = await this.dispatcher.dispatch(request, ctx);
        await this.reply(info.id, response);
        return;
      }
    }
  }

  private async reply(connectionId: string, response: ResponseEnvelope): Promise<void> {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      log.debug('Client gone before response', { connectionId, id: response.id });
      return;
    }
    try {
      await connection.send(response);
    } catch (err) {
      log.warn('Failed to send response', { connectionId, id: response.id, error: errorMessage(err) });
    }
  }

  private safeEmit(name: keyof ServerEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      log.error('Event handler threw', { event: name, error: errorMessage(err) });
    }
  }
}
