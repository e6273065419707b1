/**
 * Error Types for hostbridge
 *
 * Re-exports error classes from @hostbridge/utils, which is the single
 * source of truth. This module exists so SDK consumers can import errors
 * from either '@hostbridge/sdk' or '@hostbridge/sdk/errors'.
 */

export {
  HostBridgeError,
  ProtocolError,
  HandshakeError,
  ConnectionError,
  NotConnectedError,
  TimeoutError,
  CancelledError,
  CommandFailedError,
} from '@hostbridge/utils/errors';
