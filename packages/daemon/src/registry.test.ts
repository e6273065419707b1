import { describe, it, expect, vi } from 'vitest';
import { MissingParameterError } from '@hostbridge/utils/errors';
import type { InvocationContext } from './context.js';
import { CommandRegistry } from './registry.js';

function makeCtx(overrides: Partial<InvocationContext> = {}): InvocationContext {
  return {
    requestId: 'req_1',
    command: 'test',
    connectionId: 'conn_1',
    receivedAt: 0,
    callPeer: vi.fn(),
    ...overrides,
  };
}

describe('CommandRegistry', () => {
  it('looks up tools by exact name', () => {
    const registry = new CommandRegistry();
    registry.register('echo', { handler: (params) => params });

    expect(registry.lookup('echo')?.name).toBe('echo');
    expect(registry.lookup('Echo')).toBeUndefined();
    expect(registry.lookup('echo', 'resource')).toBeUndefined();
  });

  it('keeps tools and resources in separate namespaces', () => {
    const registry = new CommandRegistry();
    registry.register('scene', { handler: () => 'tool' });
    registry.registerResource('scene', { urlPattern: 'hostbridge://scene', handler: () => 'resource' });

    expect(registry.size).toBe(2);
    expect(registry.lookup('scene', 'tool')?.kind).toBe('tool');
    expect(registry.lookup('scene', 'resource')?.urlPattern).toBe('hostbridge://scene');
    expect(registry.list('resource').map((entry) => entry.name)).toEqual(['scene']);
  });

  it('replaces an entry registered under the same name', async () => {
    const registry = new CommandRegistry();
    registry.register('version', { handler: () => 1 });
    registry.register('version', { handler: () => 2 });

    expect(registry.size).toBe(1);
    await expect(registry.lookup('version')?.invoke({}, makeCtx())).resolves.toBe(2);
  });

  it('refuses registration once frozen', () => {
    const registry = new CommandRegistry();
    registry.register('echo', { handler: () => null });
    registry.freeze();

    expect(registry.frozen).toBe(true);
    expect(() => registry.register('late', { handler: () => null })).toThrow(
      'Registry is frozen; cannot register late'
    );
    expect(registry.lookup('echo')).toBeDefined();
  });

  it('rejects empty names', () => {
    const registry = new CommandRegistry();
    expect(() => registry.register('  ', { handler: () => null })).toThrow('Command name must not be empty');
  });

  describe('invoke', () => {
    it('adapts parameters and snake_cases top-level result keys', async () => {
      const registry = new CommandRegistry();
      const entry = registry.register('inspect', {
        params: [{ name: 'objectId', type: 'string', required: true }],
        handler: (params) => ({ objectName: params.objectId, childCount: 2, tags: [{ isActive: true }] }),
      });

      await expect(entry.invoke({ object_id: 'cube' }, makeCtx())).resolves.toEqual({
        object_name: 'cube',
        child_count: 2,
        tags: [{ isActive: true }],
      });
    });

    it('does not rename keys inside returned data', async () => {
      const registry = new CommandRegistry();
      const entry = registry.register('lookup', {
        handler: () => ({ userRecord: { userName: 'ann', HTTPStatus: 200, list: [{ itemId: 1 }] } }),
      });

      await expect(entry.invoke({}, makeCtx())).resolves.toEqual({
        user_record: { userName: 'ann', HTTPStatus: 200, list: [{ itemId: 1 }] },
      });
    });

    it('leaves result keys alone when asked to preserve them', async () => {
      const registry = new CommandRegistry();
      const entry = registry.register('raw', {
        resultNaming: 'preserve',
        handler: () => ({ inputSchema: {} }),
      });

      await expect(entry.invoke({}, makeCtx())).resolves.toEqual({ inputSchema: {} });
    });

    it('passes the invocation context to the handler', async () => {
      const registry = new CommandRegistry();
      const handler = vi.fn(() => 'ok');
      const entry = registry.register('ctx', { handler });
      const ctx = makeCtx({ requestId: 'req_42' });

      await entry.invoke({ some_value: 1 }, ctx);

      expect(handler).toHaveBeenCalledWith({ someValue: 1 }, ctx);
    });

    it('awaits async handlers', async () => {
      const registry = new CommandRegistry();
      const entry = registry.register('later', { handler: async () => ({ doneAt: 5 }) });

      await expect(entry.invoke({}, makeCtx())).resolves.toEqual({ done_at: 5 });
    });

    it('rejects before calling the handler when a required parameter is missing', async () => {
      const registry = new CommandRegistry();
      const handler = vi.fn();
      const entry = registry.register('inspect', {
        params: [{ name: 'objectId', type: 'string', required: true }],
        handler,
      });

      await expect(entry.invoke({}, makeCtx())).rejects.toBeInstanceOf(MissingParameterError);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('getSchema', () => {
    it('describes tools and resources', () => {
      const registry = new CommandRegistry();
      registry.register('move_object', {
        description: 'Move an object',
        example: '{"command":"move_object"}',
        params: [
          { name: 'objectId', type: 'string', required: true },
          { name: 'distance', type: 'number' },
        ],
        handler: () => null,
      });
      registry.registerResource('host_info', {
        description: 'Host details',
        urlPattern: 'hostbridge://host/info',
        handler: () => null,
      });

      const schema = registry.getSchema();

      expect(schema.tools).toHaveLength(1);
      expect(schema.tools[0]).toMatchObject({
        name: 'move_object',
        description: 'Move an object',
        example: '{"command":"move_object"}',
        inputSchema: {
          type: 'object',
          properties: { object_id: { type: 'string' }, distance: { type: 'number' } },
          required: ['object_id'],
        },
      });
      expect(schema.resources).toEqual([
        expect.objectContaining({
          name: 'host_info',
          description: 'Host details',
          example: '',
          urlPattern: 'hostbridge://host/info',
        }),
      ]);
    });
  });
});
