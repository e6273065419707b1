/**
 * Error Types for hostbridge
 *
 * Single source of truth for typed error classes. Protocol errors are
 * connection-scoped; command errors become error envelopes; transport
 * errors tear down a connection.
 */

export class HostBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostBridgeError';
  }
}

export class ConfigError extends HostBridgeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Protocol errors
// =============================================================================

export class ProtocolError extends HostBridgeError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class FrameTooLargeError extends ProtocolError {
  constructor(size: number, max: number) {
    super(`Frame too large: ${size} > ${max}`);
    this.name = 'FrameTooLargeError';
  }
}

export class FrameSyncError extends ProtocolError {
  constructor(scanned: number) {
    super(`No start marker found after ${scanned} bytes`);
    this.name = 'FrameSyncError';
  }
}

export class HandshakeError extends ProtocolError {
  constructor(reason: string) {
    super(`Handshake failed: ${reason}`);
    this.name = 'HandshakeError';
  }
}

// =============================================================================
// Transport errors
// =============================================================================

export class ConnectionError extends HostBridgeError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class NotConnectedError extends HostBridgeError {
  constructor(message?: string) {
    super(message || 'Not connected to host. Start the host and call connect() first');
    this.name = 'NotConnectedError';
  }
}

export class TimeoutError extends HostBridgeError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends HostBridgeError {
  constructor(operation: string, reason?: string) {
    super(reason ? `Cancelled: ${operation} (${reason})` : `Cancelled: ${operation}`);
    this.name = 'CancelledError';
  }
}

// =============================================================================
// Command errors (converted to error envelopes)
// =============================================================================

/**
 * Declared application failure. Handlers throw this (or a subclass) to report
 * an expected error; the dispatcher forwards the message verbatim.
 */
export class CommandError extends HostBridgeError {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export class UnknownCommandError extends CommandError {
  constructor(command: string) {
    super(`Unknown command: ${command}`);
    this.name = 'UnknownCommandError';
  }
}

export class UnknownResourceError extends CommandError {
  constructor(resource: string) {
    super(`Unknown resource: ${resource}`);
    this.name = 'UnknownResourceError';
  }
}

export class MissingParameterError extends CommandError {
  readonly parameter: string;

  constructor(parameter: string) {
    super(`Missing required parameter: ${parameter}`);
    this.name = 'MissingParameterError';
    this.parameter = parameter;
  }
}

export class ParameterTypeError extends CommandError {
  readonly parameter: string;

  constructor(parameter: string, expected: string, received: string) {
    super(`Invalid parameter ${parameter}: expected ${expected}, got ${received}`);
    this.name = 'ParameterTypeError';
    this.parameter = parameter;
  }
}

/**
 * Raised on the client when the host answered with `status: "error"`.
 */
export class CommandFailedError extends HostBridgeError {
  readonly command: string;
  readonly remoteMessage: string;

  constructor(command: string, remoteMessage: string) {
    super(`Error executing command ${command}: ${remoteMessage}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.remoteMessage = remoteMessage;
  }
}

/**
 * Describe an unknown thrown value for logs and error envelopes.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
