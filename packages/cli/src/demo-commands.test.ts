import { describe, it, expect, vi } from 'vitest';
import { CommandRegistry, type InvocationContext } from '@hostbridge/daemon';
import { HOST_INFO_URL, registerDemoCommands } from './demo-commands.js';

function context(command: string): InvocationContext {
  return {
    requestId: 'req_test',
    command,
    connectionId: 'conn_test',
    receivedAt: 0,
    callPeer: vi.fn(),
  };
}

function invoke(
  registry: CommandRegistry,
  name: string,
  params: Record<string, unknown>,
  kind: 'tool' | 'resource' = 'tool'
): Promise<unknown> {
  const entry = registry.lookup(name, kind);
  if (!entry) throw new Error(`not registered: ${name}`);
  return entry.invoke(params, context(name));
}

describe('demo commands', () => {
  const registry = new CommandRegistry();
  registerDemoCommands(registry, { hostName: 'test-host' });

  it('registers tools and the host_info resource', () => {
    expect(registry.list('tool').map((entry) => entry.name)).toEqual(['echo', 'add', 'get_host_info']);
    expect(registry.lookup('host_info', 'resource')?.urlPattern).toBe(HOST_INFO_URL);
  });

  it('echoes any JSON value', async () => {
    expect(await invoke(registry, 'echo', { value: { nested: [1, 2] } })).toEqual({ value: { nested: [1, 2] } });
  });

  it('echoes objects without renaming their keys', async () => {
    const value = { userName: 'ann', HTTPStatus: 200, list: [{ itemId: 1 }] };
    expect(await invoke(registry, 'echo', { value })).toEqual({ value });
  });

  it('adds numbers', async () => {
    expect(await invoke(registry, 'add', { a: 2.5, b: '1.5' })).toEqual({ sum: 4 });
  });

  it('describes the host with snake_case keys', async () => {
    const info = await invoke(registry, 'get_host_info', {});

    expect(info).toMatchObject({
      host_name: 'test-host',
      platform: process.platform,
      node_version: process.version,
      pid: process.pid,
    });
  });

  it('serves the same details as a resource', async () => {
    expect(await invoke(registry, 'host_info', {}, 'resource')).toMatchObject({ host_name: 'test-host' });
  });
});
