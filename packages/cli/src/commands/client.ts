/**
 * One-shot client commands: call, read, schema and ping.
 */

import { performance } from 'node:perf_hooks';
import { BridgeClient, type HostSchema } from '@hostbridge/sdk';
import { ConfigError, errorMessage } from '@hostbridge/utils/errors';
import { isPlainObject } from '@hostbridge/utils/casing';
import { resolveClientConfig, type ConnectionOptions } from './options.js';

export interface ClientCommandOptions extends ConnectionOptions {
  timeout?: string;
}

export function parseParams(json: string | undefined): Record<string, unknown> {
  if (json === undefined || json.trim() === '') return {};
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new ConfigError(`Invalid parameters: ${errorMessage(err)}`);
  }
  if (!isPlainObject(value)) {
    throw new ConfigError('Invalid parameters: expected a JSON object');
  }
  return value;
}

export function formatResult(result: unknown): string {
  if (typeof result === 'string') return result;
  return JSON.stringify(result ?? null, null, 2);
}

export function formatSchema(schema: HostSchema): string[] {
  const describe = (name: string, description: string) => (description ? `  ${name} - ${description}` : `  ${name}`);
  return [
    `Tools (${schema.tools.length}):`,
    ...schema.tools.map((tool) => describe(tool.name, tool.description)),
    `Resources (${schema.resources.length}):`,
    ...schema.resources.map((resource) =>
      describe(resource.urlPattern ? `${resource.name} ${resource.urlPattern}` : resource.name, resource.description)
    ),
  ];
}

/**
 * Connect, run `fn`, and always tear the connection down.
 */
export async function withClient<T>(
  options: ClientCommandOptions,
  fn: (client: BridgeClient) => Promise<T>
): Promise<T> {
  const client = new BridgeClient(resolveClientConfig(options));
  try {
    await client.connect();
    return await fn(client);
  } finally {
    client.destroy();
  }
}

export function runCall(command: string, params: string | undefined, options: ClientCommandOptions): Promise<string> {
  const parameters = parseParams(params);
  return withClient(options, async (client) => formatResult(await client.invoke(command, parameters)));
}

export function runRead(resource: string, params: string | undefined, options: ClientCommandOptions): Promise<string> {
  const parameters = parseParams(params);
  return withClient(options, async (client) => formatResult(await client.accessResource(resource, parameters)));
}

export function runSchema(options: ClientCommandOptions): Promise<string[]> {
  return withClient(options, async (client) => formatSchema(await client.getSchema()));
}

export function runPing(options: ClientCommandOptions): Promise<string> {
  return withClient(options, async (client) => {
    const started = performance.now();
    await client.invoke('get_metrics');
    const elapsedMs = performance.now() - started;
    return `Host at ${client.endpoint} responded in ${elapsedMs.toFixed(1)}ms`;
  });
}
