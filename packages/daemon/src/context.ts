/**
 * Invocation context handed to every command handler.
 */

import type { ResponseEnvelope } from '@hostbridge/protocol';

/** Issue a request back to the peer that sent the current command. */
export type CallPeer = (
  command: string,
  parameters?: Record<string, unknown>,
  timeoutMs?: number
) => Promise<ResponseEnvelope>;

export interface InvocationContext {
  requestId: string;
  command: string;
  connectionId: string;
  remoteAddress?: string;
  receivedAt: number;
  callPeer: CallPeer;
}

export interface ConnectionInfo {
  id: string;
  remoteAddress?: string;
  remotePort?: number;
  createdAt: number;
}
