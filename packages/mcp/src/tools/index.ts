/**
 * MCP tools, one per command the host registers.
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { HostSchema, ToolInfo } from '@hostbridge/sdk';
import { isPlainObject } from '@hostbridge/utils/casing';
import { CommandFailedError, errorMessage } from '@hostbridge/utils/errors';
import { createLogger } from '@hostbridge/utils/logger';
import { ensureConnected, type HostClient } from '../client.js';
import { toToolError, toToolResult } from '../content.js';

const log = createLogger('mcp');

export function toInputSchema(schema: Record<string, unknown>): Tool['inputSchema'] {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((name): name is string => typeof name === 'string')
    : [];
  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

export function toTool(info: ToolInfo): Tool {
  const description = info.description || `Host command: ${info.name}`;
  return {
    name: info.name,
    description: info.example ? `${description}\n\nExample: ${info.example}` : description,
    inputSchema: toInputSchema(info.inputSchema),
  };
}

export function listTools(schema: HostSchema): Tool[] {
  return schema.tools.map(toTool);
}

/**
 * Run a host command. Failures come back as `isError` results, never throws.
 */
export async function callHostTool(
  client: HostClient,
  name: string,
  args: Record<string, unknown> = {}
): Promise<CallToolResult> {
  try {
    await ensureConnected(client);
    return toToolResult(await client.invoke(name, args));
  } catch (err) {
    const message = errorMessage(err);
    log.warn('Tool call failed', { tool: name, error: message });
    // CommandFailedError already names the command
    return toToolError(err instanceof CommandFailedError ? message : `Error executing ${name}: ${message}`);
  }
}
