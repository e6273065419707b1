/**
 * @hostbridge/sdk
 *
 * Client for calling commands on a hostbridge host.
 *
 * ```typescript
 * import { BridgeClient } from '@hostbridge/sdk';
 *
 * const client = new BridgeClient({ port: 8080 });
 * await client.connect();
 * const result = await client.invoke('echo', { value: 'hi' });
 * ```
 */

// Main client
export {
  BridgeClient,
  type ClientState,
  type ClientConfig,
  type RequestOptions,
  type LocalHandler,
} from './client.js';

// Host schema
export {
  HostSchemaSchema,
  ToolInfoSchema,
  ResourceInfoSchema,
  parseHostSchema,
  type HostSchema,
  type ToolInfo,
  type ResourceInfo,
} from './schema.js';

// Errors
export {
  HostBridgeError,
  ProtocolError,
  HandshakeError,
  ConnectionError,
  NotConnectedError,
  TimeoutError,
  CancelledError,
  CommandFailedError,
} from './errors.js';

// Protocol types (re-export for convenience)
export type { RequestEnvelope, ResponseEnvelope, Envelope } from '@hostbridge/protocol';
