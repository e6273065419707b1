/**
 * hostbridge configuration defaults and loader.
 *
 * Precedence (lowest to highest): defaults, JSON config file, environment.
 */

import fs from 'node:fs';
import type { z } from 'zod';
import { ConfigError, errorMessage } from '@hostbridge/utils/errors';
import {
  BridgeConfigFileSchema,
  ClientConfigSchema,
  PumpConfigSchema,
  ServerConfigSchema,
  type ClientConfig,
  type PumpConfig,
  type ServerConfig,
} from './schemas.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8080;

export const DEFAULT_SERVER_CONFIG = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  maxMessageBytes: 10 * 1024 * 1024,
  maxSyncScanBytes: 1000,
  handshakeTimeoutMs: 10_000,
  handshakeMaxBytes: 1024,
  closeTimeoutMs: 1000,
  idleTimeoutMs: 0,
  requestTimeoutMs: 60_000,
} as const;

export const DEFAULT_PUMP_CONFIG = {
  maxMessagesPerDrain: 10,
  maxDrainMs: 5,
  queueHighWaterMark: 100,
  rateHighWaterMark: 100,
  rateWindowMs: 5000,
  slowCommandWarnMs: 100,
  reportIntervalMs: 60_000,
} as const;

export const DEFAULT_CLIENT_CONFIG = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  maxMessageBytes: 10 * 1024 * 1024,
  connectTimeoutMs: 5000,
  handshakeTimeoutMs: 10_000,
  requestTimeoutMs: 60_000,
  keepaliveIntervalMs: 30_000,
  reconnect: true,
  maxReconnectAttempts: 5,
  reconnectDelayMs: 2000,
} as const;

/** Default config file name, looked up in the working directory */
export const CONFIG_FILE_NAME = 'hostbridge.config.json';

export interface BridgeConfig {
  server: ServerConfig;
  pump: PumpConfig;
  client: ClientConfig;
}

export interface LoadBridgeConfigOptions {
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Path to a JSON config file; a missing file is an error only when given explicitly */
  file?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function readIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function readConfigFile(file: string | undefined): unknown {
  const target = file ?? CONFIG_FILE_NAME;
  if (!fs.existsSync(target)) {
    if (file) throw new ConfigError(`Config file not found: ${file}`);
    return {};
  }
  const content = fs.readFileSync(target, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${target}: ${errorMessage(err)}`);
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<ServerConfig & ClientConfig> {
  const overrides: Partial<ServerConfig & ClientConfig> = {};
  if (env.HOSTBRIDGE_HOST) overrides.host = env.HOSTBRIDGE_HOST;
  const portValue = readIntEnv(env, 'HOSTBRIDGE_PORT');
  if (portValue !== undefined) overrides.port = portValue;
  const maxBytes = readIntEnv(env, 'HOSTBRIDGE_MAX_MESSAGE_BYTES');
  if (maxBytes !== undefined) overrides.maxMessageBytes = maxBytes;
  const timeout = readIntEnv(env, 'HOSTBRIDGE_REQUEST_TIMEOUT_MS');
  if (timeout !== undefined) overrides.requestTimeoutMs = timeout;
  return overrides;
}

/**
 * Load the full configuration: defaults, then the config file, then environment.
 *
 * @throws ConfigError on unreadable files or values that fail validation
 */
export function loadBridgeConfig(options: LoadBridgeConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;

  const parsedFile = BridgeConfigFileSchema.safeParse(readConfigFile(options.file));
  if (!parsedFile.success) {
    throw new ConfigError(`Invalid config file: ${describeIssues(parsedFile.error)}`);
  }
  const fromFile = parsedFile.data;
  const fromEnv = envOverrides(env);

  const server = ServerConfigSchema.safeParse({ ...DEFAULT_SERVER_CONFIG, ...fromFile.server, ...fromEnv });
  const pump = PumpConfigSchema.safeParse({ ...DEFAULT_PUMP_CONFIG, ...fromFile.pump });
  const client = ClientConfigSchema.safeParse({ ...DEFAULT_CLIENT_CONFIG, ...fromFile.client, ...fromEnv });

  if (!server.success) throw new ConfigError(`Invalid server config: ${describeIssues(server.error)}`);
  if (!pump.success) throw new ConfigError(`Invalid pump config: ${describeIssues(pump.error)}`);
  if (!client.success) throw new ConfigError(`Invalid client config: ${describeIssues(client.error)}`);

  return { server: server.data, pump: pump.data, client: client.data };
}
