import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { HostSchema } from '@hostbridge/sdk';
import { errorMessage } from '@hostbridge/utils/errors';
import { createLogger } from '@hostbridge/utils/logger';
import type { HostClient } from './client.js';
import { SchemaCache, DEFAULT_SCHEMA_TTL_MS } from './schema-cache.js';
import { callHostTool, listTools } from './tools/index.js';
import {
  listResources,
  listResourceTemplates,
  readHostResource,
  resolveResource,
} from './resources/index.js';

const log = createLogger('mcp');

const EMPTY_SCHEMA: HostSchema = { tools: [], resources: [] };

/**
 * MCP Server configuration options
 */
export interface MCPServerConfig {
  name?: string;
  version?: string;
  /** How long a fetched host schema is reused (default: 30s) */
  schemaTtlMs?: number;
}

/**
 * Create and configure an MCP server that exposes a host's commands
 */
export function createMCPServer(client: HostClient, config?: MCPServerConfig): Server {
  const serverName = config?.name ?? 'hostbridge-mcp';
  const serverVersion = config?.version ?? '0.1.0';
  const cache = new SchemaCache(client, config?.schemaTtlMs ?? DEFAULT_SCHEMA_TTL_MS);

  // Listing never fails: an unreachable host just has nothing to offer yet
  const schemaForListing = async (): Promise<HostSchema> => {
    try {
      return await cache.get();
    } catch (err) {
      log.warn('Could not fetch host schema', { error: errorMessage(err) });
      return EMPTY_SCHEMA;
    }
  };

  const server = new Server(
    {
      name: serverName,
      version: serverVersion,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(await schemaForListing()),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callHostTool(client, name, args ?? {});
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: listResources(await schemaForListing()),
  }));

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
    resourceTemplates: listResourceTemplates(await schemaForListing()),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    let schema = await cache.get();
    if (!resolveResource(schema, uri)) {
      // The host may have registered it since the schema was cached
      cache.invalidate();
      schema = await cache.get();
    }
    return readHostResource(client, schema, uri);
  });

  return server;
}

/**
 * Run the MCP server with stdio transport.
 * This is the main entry point when running as a standalone process.
 */
export async function runMCPServer(client: HostClient, config?: MCPServerConfig): Promise<void> {
  const server = createMCPServer(client, config);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  log.info('MCP server running on stdio', { name: config?.name ?? 'hostbridge-mcp' });

  const shutdown = async (signal: string): Promise<void> => {
    log.info('Shutting down', { signal });
    client.destroy?.();
    try {
      await server.close();
    } catch (err) {
      log.error('Error closing MCP server', { error: errorMessage(err) });
    }
    process.exit(0);
  };

  // Handle graceful shutdown
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}
