/**
 * Plaintext tokens exchanged outside of framing.
 */

/** Sent by the client right after the TCP connection opens */
export const HANDSHAKE_REQUEST = 'HOSTBRIDGE_HANDSHAKE_REQUEST';
/** Sent by the server once the request token has been read */
export const HANDSHAKE_RESPONSE = 'HOSTBRIDGE_HANDSHAKE_RESPONSE';

export const PING = 'PING';
export const PONG = 'PONG';

export const KEEPALIVE_TOKENS = [PING, PONG] as const;
export type KeepaliveToken = (typeof KEEPALIVE_TOKENS)[number];

/** Token sent back for a received keepalive token, if any. */
export function keepaliveReply(token: KeepaliveToken): KeepaliveToken | undefined {
  return token === PING ? PONG : undefined;
}
