import { describe, it, expect } from 'vitest';
import { HandshakeReader } from './handshake.js';
import { HANDSHAKE_REQUEST } from './tokens.js';
import { encodeFrame } from './framing.js';

describe('HandshakeReader', () => {
  it('matches a token split across three reads', () => {
    const reader = new HandshakeReader(HANDSHAKE_REQUEST);
    const token = Buffer.from(HANDSHAKE_REQUEST);

    expect(reader.push(token.subarray(0, 5))).toEqual({ status: 'pending' });
    expect(reader.push(token.subarray(5, 17))).toEqual({ status: 'pending' });
    expect(reader.push(token.subarray(17))).toEqual({ status: 'matched', rest: Buffer.alloc(0) });
  });

  it('hands back bytes that follow the token', () => {
    const reader = new HandshakeReader(HANDSHAKE_REQUEST);
    const frame = encodeFrame('{"id":"r1","command":"echo"}');
    const result = reader.push(Buffer.concat([Buffer.from(HANDSHAKE_REQUEST), frame]));

    expect(result).toEqual({ status: 'matched', rest: frame });
  });

  it('fails when the byte budget runs out', () => {
    const reader = new HandshakeReader(HANDSHAKE_REQUEST, 64);
    expect(reader.push(Buffer.alloc(40, 0x41))).toEqual({ status: 'pending' });
    expect(reader.push(Buffer.alloc(24, 0x41))).toEqual({
      status: 'failed',
      reason: 'no handshake token within 64 bytes',
    });
  });

  it('fails on framed data before the token', () => {
    const reader = new HandshakeReader(HANDSHAKE_REQUEST);
    expect(reader.push(encodeFrame('{"id":"r1"}'))).toEqual({
      status: 'failed',
      reason: 'framed data before handshake',
    });
  });

  it('refuses further input after a result', () => {
    const reader = new HandshakeReader(HANDSHAKE_REQUEST);
    reader.push(Buffer.from(HANDSHAKE_REQUEST));
    expect(reader.push(Buffer.from('more'))).toMatchObject({ status: 'failed' });
  });
});
