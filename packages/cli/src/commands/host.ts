/**
 * `hostbridge host`: a BridgeServer serving the demo commands, drained from a
 * fixed-interval tick the way an embedding application would.
 */

import { BridgeServer, CommandRegistry, type ServerAddress } from '@hostbridge/daemon';
import { createLogger } from '@hostbridge/utils/logger';
import { registerDemoCommands, type HostInfoOptions } from '../demo-commands.js';
import { startTickLoop } from '../tick.js';
import { parseMs, resolveServerConfig, type ConnectionOptions } from './options.js';

const log = createLogger('host');

export const DEFAULT_TICK_MS = 16;

export interface HostCommandOptions extends ConnectionOptions {
  tickMs?: string;
}

export interface DemoHost {
  server: BridgeServer;
  address: ServerAddress;
  stop(reason?: string): Promise<void>;
}

export async function startDemoHost(
  options: HostCommandOptions = {},
  hostInfo: HostInfoOptions = {}
): Promise<DemoHost> {
  const { server: config, pump } = resolveServerConfig(options);
  const tickMs = options.tickMs !== undefined ? parseMs(options.tickMs, 'tick interval') : DEFAULT_TICK_MS;

  const registry = new CommandRegistry();
  registerDemoCommands(registry, hostInfo);

  const server = new BridgeServer({
    config,
    pump,
    registry,
    events: {
      onClientConnected: (connection) =>
        log.info('Client connected', { id: connection.id, remote: connection.remoteAddress }),
      onClientDisconnected: (connection, reason) => log.info('Client disconnected', { id: connection.id, reason }),
      onError: (message, connectionId) => log.warn('Host error', { message, connectionId }),
    },
  });
  // get_schema and get_metrics are registered by the server
  registry.freeze();

  const address = await server.start();
  const loop = startTickLoop(server, tickMs, log);

  return {
    server,
    address,
    stop: async (reason = 'host shutting down') => {
      loop.stop();
      await server.stop(reason);
    },
  };
}
