#!/usr/bin/env node
/**
 * hostbridge-mcp
 *
 * Runs an MCP server on stdio that exposes a hostbridge host's commands as
 * tools and its resources as MCP resources.
 *
 * Usage:
 *   hostbridge-mcp --host 127.0.0.1 --port 8080
 */

import { parseArgs } from 'node:util';

// stdout carries the MCP protocol; all logging goes to stderr
process.env.HOSTBRIDGE_LOG_STDERR = '1';

const { values } = parseArgs({
  options: {
    help: { type: 'boolean', short: 'h' },
    version: { type: 'boolean', short: 'v' },
    host: { type: 'string', short: 'H' },
    port: { type: 'string', short: 'p' },
    config: { type: 'string', short: 'c' },
  },
});

const VERSION = '0.1.0';

function showHelp(): void {
  console.error(`
hostbridge-mcp v${VERSION} - MCP server for a hostbridge host

Usage:
  hostbridge-mcp [options]

Options:
  -H, --host <host>     Host address (default: 127.0.0.1, or HOSTBRIDGE_HOST)
  -p, --port <port>     Host port (default: 8080, or HOSTBRIDGE_PORT)
  -c, --config <path>   JSON config file (default: ./hostbridge.config.json if present)
  -h, --help            Show this help
  -v, --version         Show version
`);
}

if (values.help) {
  showHelp();
  process.exit(0);
}

if (values.version) {
  console.log(VERSION);
  process.exit(0);
}

async function main(): Promise<void> {
  const { loadBridgeConfig } = await import('@hostbridge/config');
  const { BridgeClient } = await import('@hostbridge/sdk');
  const { ConfigError } = await import('@hostbridge/utils/errors');
  const { runMCPServer } = await import('./server.js');

  const { client: clientConfig } = loadBridgeConfig({ file: values.config });
  if (values.host) clientConfig.host = values.host;
  if (values.port) {
    const port = Number(values.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`Invalid port: ${values.port}`);
    }
    clientConfig.port = port;
  }

  const client = new BridgeClient({ ...clientConfig, reconnect: true });
  await runMCPServer(client, { version: VERSION });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Failed to start MCP server:', message);
  process.exit(1);
});
