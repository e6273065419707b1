import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = (schema: object, id: string) => Object.assign(schema, { $id: id });

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

// Transport server (host side)
export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port,
  maxMessageBytes: z.number().int().positive(),
  maxSyncScanBytes: z.number().int().positive(),
  handshakeTimeoutMs: positiveMs,
  handshakeMaxBytes: z.number().int().positive(),
  closeTimeoutMs: z.number().int().nonnegative(),
  /** 0 disables the idle timeout */
  idleTimeoutMs: z.number().int().nonnegative(),
  requestTimeoutMs: positiveMs,
});

// Host pump budgets and back-pressure warnings
export const PumpConfigSchema = z.object({
  maxMessagesPerDrain: z.number().int().positive(),
  maxDrainMs: z.number().nonnegative(),
  queueHighWaterMark: z.number().int().positive(),
  rateHighWaterMark: z.number().positive(),
  rateWindowMs: positiveMs,
  slowCommandWarnMs: z.number().nonnegative(),
  /** Period of the execution report log; 0 turns it off */
  reportIntervalMs: z.number().int().nonnegative(),
});

// Transport client (remote side)
export const ClientConfigSchema = z.object({
  host: z.string().min(1),
  port,
  maxMessageBytes: z.number().int().positive(),
  connectTimeoutMs: positiveMs,
  handshakeTimeoutMs: positiveMs,
  requestTimeoutMs: positiveMs,
  /** 0 disables keepalive pings */
  keepaliveIntervalMs: z.number().int().nonnegative(),
  reconnect: z.boolean(),
  maxReconnectAttempts: z.number().int().nonnegative(),
  reconnectDelayMs: z.number().int().nonnegative(),
});

// Optional JSON config file; every section is partial and merged over defaults
export const BridgeConfigFileSchema = z.object({
  server: ServerConfigSchema.partial().optional(),
  pump: PumpConfigSchema.partial().optional(),
  client: ClientConfigSchema.partial().optional(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type PumpConfig = z.infer<typeof PumpConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type BridgeConfigFile = z.infer<typeof BridgeConfigFileSchema>;

export const jsonSchemas = {
  server: withId(zodToJsonSchema(ServerConfigSchema, { target: 'jsonSchema7' }), 'HostBridgeServerConfig'),
  pump: withId(zodToJsonSchema(PumpConfigSchema, { target: 'jsonSchema7' }), 'HostBridgePumpConfig'),
  client: withId(zodToJsonSchema(ClientConfigSchema, { target: 'jsonSchema7' }), 'HostBridgeClientConfig'),
  file: withId(zodToJsonSchema(BridgeConfigFileSchema, { target: 'jsonSchema7' }), 'HostBridgeConfigFile'),
};
