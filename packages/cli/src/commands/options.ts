import { loadBridgeConfig, type ClientConfig, type PumpConfig, type ServerConfig } from '@hostbridge/config';
import { ConfigError } from '@hostbridge/utils/errors';

/** Options shared by every command */
export interface ConnectionOptions {
  host?: string;
  port?: string;
  config?: string;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

export function parseMs(value: string, name: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigError(`Invalid ${name}: ${value}`);
  }
  return ms;
}

function addressOverrides(options: ConnectionOptions): { host?: string; port?: number } {
  return {
    ...(options.host ? { host: options.host } : {}),
    ...(options.port !== undefined ? { port: parsePort(options.port) } : {}),
  };
}

export function resolveServerConfig(options: ConnectionOptions): { server: ServerConfig; pump: PumpConfig } {
  const { server, pump } = loadBridgeConfig({ file: options.config });
  return { server: { ...server, ...addressOverrides(options) }, pump };
}

export function resolveClientConfig(options: ConnectionOptions & { timeout?: string }): ClientConfig {
  const { client } = loadBridgeConfig({ file: options.config });
  return {
    ...client,
    ...addressOverrides(options),
    ...(options.timeout !== undefined ? { requestTimeoutMs: parseMs(options.timeout, 'timeout') } : {}),
    // One-shot commands
    reconnect: false,
    keepaliveIntervalMs: 0,
  };
}
