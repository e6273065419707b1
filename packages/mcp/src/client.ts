/**
 * HostClient - what the MCP bridge needs from a hostbridge connection.
 *
 * BridgeClient from @hostbridge/sdk satisfies this interface; tests pass a
 * mock object instead.
 */

import type { HostSchema } from '@hostbridge/sdk';
import { HostBridgeError, errorMessage } from '@hostbridge/utils/errors';

export interface HostClient {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  invoke(command: string, parameters?: Record<string, unknown>): Promise<unknown>;
  getSchema(): Promise<HostSchema>;
  accessResource(name: string, parameters?: Record<string, unknown>): Promise<unknown>;
  /** Called once when the MCP server shuts down */
  destroy?(): void;
}

export class HostUnavailableError extends HostBridgeError {
  constructor(reason: string) {
    super(`Host is not reachable: ${reason}`);
    this.name = 'HostUnavailableError';
  }
}

/**
 * Connect on demand. The host may start after the MCP server does.
 */
export async function ensureConnected(client: HostClient): Promise<void> {
  if (client.isConnected) return;
  try {
    await client.connect();
  } catch (err) {
    throw new HostUnavailableError(errorMessage(err));
  }
}
