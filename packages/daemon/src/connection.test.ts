import { EventEmitter } from 'node:events';
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  HANDSHAKE_REQUEST,
  HANDSHAKE_RESPONSE,
  encodeEnvelope,
  encodeFrame,
  successResponse,
} from '@hostbridge/protocol';
import { NotConnectedError } from '@hostbridge/utils/errors';
import { Connection, type ConnectionCallbacks, type ConnectionConfig } from './connection.js';

class MockSocket extends EventEmitter {
  readonly remoteAddress = '127.0.0.1';
  readonly remotePort = 50123;
  written: Buffer[] = [];
  destroyed = false;
  ended = false;
  failWrites = false;

  write(chunk: Buffer, cb: (err?: Error | null) => void): boolean {
    if (this.failWrites) {
      cb(new Error('EPIPE'));
      return false;
    }
    this.written.push(Buffer.from(chunk));
    cb();
    return true;
  }

  end(): void {
    this.ended = true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.emit('close');
  }

  writtenText(): string[] {
    return this.written.map((chunk) => chunk.toString('utf-8'));
  }
}

function setup(config: Partial<ConnectionConfig> = {}) {
  const socket = new MockSocket();
  const callbacks = {
    onActive: vi.fn(),
    onEnvelope: vi.fn(),
    onProtocolError: vi.fn(),
    onHandshakeFailed: vi.fn(),
    onClose: vi.fn(),
  } satisfies ConnectionCallbacks;
  const connection = new Connection(socket, config, callbacks);
  return { socket, callbacks, connection };
}

function activate(socket: MockSocket): void {
  socket.emit('data', Buffer.from(HANDSHAKE_REQUEST, 'utf-8'));
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('Connection', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('handshake', () => {
    it('accepts a token split across several reads', async () => {
      const { socket, callbacks, connection } = setup();
      const token = Buffer.from(HANDSHAKE_REQUEST, 'utf-8');

      socket.emit('data', token.subarray(0, 5));
      socket.emit('data', token.subarray(5, 17));
      expect(connection.state).toBe('HANDSHAKING');
      socket.emit('data', token.subarray(17));

      expect(connection.state).toBe('ACTIVE');
      expect(connection.alive).toBe(true);
      expect(callbacks.onActive).toHaveBeenCalledTimes(1);
      await flush();
      expect(socket.writtenText()).toEqual([HANDSHAKE_RESPONSE]);
      connection.destroy();
    });

    it('processes frames that arrive in the same read as the token', () => {
      const { socket, callbacks, connection } = setup();
      const request = { id: 'r1', command: 'echo', parameters: { value: 'x' } };

      socket.emit('data', Buffer.concat([Buffer.from(HANDSHAKE_REQUEST, 'utf-8'), encodeEnvelope(request)]));

      expect(callbacks.onEnvelope).toHaveBeenCalledTimes(1);
      expect(callbacks.onEnvelope).toHaveBeenCalledWith(
        connection,
        { kind: 'request', envelope: request },
        expect.any(Number)
      );
      connection.destroy();
    });

    it('fails on framed data before the token without ever becoming active', () => {
      const { socket, callbacks, connection } = setup();

      socket.emit('data', encodeFrame('{"id":"r1","command":"echo"}'));

      expect(callbacks.onHandshakeFailed).toHaveBeenCalledWith(connection, 'framed data before handshake');
      expect(callbacks.onActive).not.toHaveBeenCalled();
      expect(callbacks.onClose).not.toHaveBeenCalled();
      expect(connection.state).toBe('CLOSED');
      expect(socket.destroyed).toBe(true);
    });

    it('fails when the token does not show up in time', () => {
      vi.useFakeTimers();
      const { socket, callbacks, connection } = setup({ handshakeTimeoutMs: 50 });

      socket.emit('data', Buffer.from('HOSTBRIDGE_', 'utf-8'));
      vi.advanceTimersByTime(50);

      expect(callbacks.onHandshakeFailed).toHaveBeenCalledWith(connection, 'timeout after 50ms');
      expect(socket.destroyed).toBe(true);
      expect(callbacks.onClose).not.toHaveBeenCalled();
    });

    it('fails when too many bytes arrive without the token', () => {
      const { socket, callbacks, connection } = setup({ handshakeMaxBytes: 16 });

      socket.emit('data', Buffer.from('GET / HTTP/1.1\r\nHost: x\r\n', 'utf-8'));

      expect(callbacks.onHandshakeFailed).toHaveBeenCalledWith(connection, 'no handshake token within 16 bytes');
      expect(socket.destroyed).toBe(true);
    });
  });

  describe('keepalive', () => {
    it('answers a bare PING with a bare PONG', async () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);

      socket.emit('data', Buffer.from('PING', 'utf-8'));
      await flush();

      expect(socket.writtenText()).toEqual([HANDSHAKE_RESPONSE, 'PONG']);
      expect(callbacks.onEnvelope).not.toHaveBeenCalled();
      connection.destroy();
    });

    it('answers a framed PING with a framed PONG', async () => {
      const { socket, connection } = setup();
      activate(socket);

      socket.emit('data', encodeFrame('PING'));
      await flush();

      expect(socket.written[1]).toEqual(encodeFrame('PONG'));
      connection.destroy();
    });

    it('does not answer a PONG', async () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);

      socket.emit('data', Buffer.from('PONG', 'utf-8'));
      await flush();

      expect(socket.writtenText()).toEqual([HANDSHAKE_RESPONSE]);
      expect(callbacks.onEnvelope).not.toHaveBeenCalled();
      connection.destroy();
    });
  });

  describe('send', () => {
    it('refuses to send before the handshake', async () => {
      const { connection } = setup();

      await expect(connection.send(successResponse('r1', null))).rejects.toBeInstanceOf(NotConnectedError);
      await expect(connection.send(successResponse('r1', null))).rejects.toThrow(
        `Connection ${connection.id} is handshaking`
      );
      connection.destroy();
    });

    it('writes one frame per envelope', async () => {
      const { socket, connection } = setup();
      activate(socket);
      const envelope = { id: 'r1', type: 'response' as const, status: 'success' as const, result: 1 };

      await connection.send(envelope);

      expect(socket.written).toHaveLength(2);
      expect(socket.written[1]).toEqual(encodeEnvelope(envelope));
      connection.destroy();
    });

    it('tears the connection down when a write fails', async () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);
      await flush();
      socket.failWrites = true;

      await expect(connection.send(successResponse('r1', null))).rejects.toThrow('EPIPE');

      expect(connection.state).toBe('CLOSED');
      expect(callbacks.onClose).toHaveBeenCalledWith(connection, 'write failed: EPIPE');
    });
  });

  describe('closing', () => {
    it('reports a remote close', () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);

      socket.emit('close');

      expect(connection.state).toBe('CLOSED');
      expect(callbacks.onClose).toHaveBeenCalledWith(connection, 'socket closed');
    });

    it('carries a socket error into the close reason', () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);

      socket.emit('error', new Error('ECONNRESET'));
      socket.emit('close');

      expect(callbacks.onClose).toHaveBeenCalledWith(connection, 'socket error: ECONNRESET');
    });

    it('sends a close notice before ending the socket', async () => {
      const { socket, callbacks, connection } = setup();
      activate(socket);

      await connection.close('shutting down');

      expect(socket.written[socket.written.length - 1]).toEqual(
        encodeEnvelope({ type: 'close', reason: 'shutting down' })
      );
      expect(socket.ended).toBe(true);
      expect(socket.destroyed).toBe(true);
      expect(callbacks.onClose).toHaveBeenCalledTimes(1);
      expect(callbacks.onClose).toHaveBeenCalledWith(connection, 'shutting down');
    });

    it('closes on a protocol error', () => {
      const { socket, callbacks, connection } = setup({ maxSyncScanBytes: 16 });
      activate(socket);

      socket.emit('data', Buffer.from('x'.repeat(20), 'utf-8'));

      expect(callbacks.onProtocolError).toHaveBeenCalledTimes(1);
      expect(callbacks.onClose).toHaveBeenCalledWith(
        connection,
        'protocol error: No start marker found after 17 bytes'
      );
      expect(socket.destroyed).toBe(true);
    });

    it('closes an idle connection', async () => {
      vi.useFakeTimers();
      const { socket, callbacks, connection } = setup({ idleTimeoutMs: 100 });
      activate(socket);

      await vi.advanceTimersByTimeAsync(100);
      await vi.advanceTimersByTimeAsync(10);

      expect(connection.state).toBe('CLOSED');
      expect(callbacks.onClose).toHaveBeenCalledWith(connection, 'idle timeout');
    });

    it('exposes connection info', () => {
      const { connection } = setup();

      expect(connection.info).toEqual({
        id: connection.id,
        remoteAddress: '127.0.0.1',
        remotePort: 50123,
        createdAt: connection.createdAt,
      });
      expect(connection.id).toMatch(/^conn_/);
      connection.destroy();
    });
  });
});
