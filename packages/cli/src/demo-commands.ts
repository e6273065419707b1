/**
 * Commands served by `hostbridge host`, for trying the bridge end to end.
 */

import os from 'node:os';
import type { CommandRegistry } from '@hostbridge/daemon';

export interface HostInfoOptions {
  hostName?: string;
}

export const HOST_INFO_URL = 'hostbridge://host/info';

export function registerDemoCommands(registry: CommandRegistry, options: HostInfoOptions = {}): void {
  const startedAt = new Date().toISOString();
  const hostInfo = () => ({
    hostName: options.hostName ?? os.hostname(),
    platform: process.platform,
    nodeVersion: process.version,
    pid: process.pid,
    startedAt,
    uptimeSec: Math.round(process.uptime()),
  });

  registry.register('echo', {
    description: 'Return the given value wrapped in an object',
    example: '{"value": "hello"}',
    params: [{ name: 'value', type: 'any', required: true, description: 'Any JSON value' }],
    resultNaming: 'preserve',
    handler: (params) => ({ value: params.value }),
  });

  registry.register('add', {
    description: 'Add two numbers',
    example: '{"a": 2, "b": 3}',
    params: [
      { name: 'a', type: 'number', required: true },
      { name: 'b', type: 'number', required: true },
    ],
    handler: (params) => ({ sum: Number(params.a) + Number(params.b) }),
  });

  registry.register('get_host_info', {
    description: 'Describe the host process',
    handler: hostInfo,
  });

  registry.registerResource('host_info', {
    description: 'Host process details',
    urlPattern: HOST_INFO_URL,
    handler: hostInfo,
  });
}
