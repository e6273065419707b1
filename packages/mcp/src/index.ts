// Client interface
export { ensureConnected, HostUnavailableError, type HostClient } from './client.js';

// Server
export { createMCPServer, runMCPServer, type MCPServerConfig } from './server.js';
export { SchemaCache, DEFAULT_SCHEMA_TTL_MS } from './schema-cache.js';

// Tools (for direct usage or custom server implementations)
export { listTools, toTool, toInputSchema, callHostTool } from './tools/index.js';

// Resources
export {
  compilePattern,
  matchUri,
  isTemplate,
  listResources,
  listResourceTemplates,
  resolveResource,
  readHostResource,
  type UriPattern,
  type ResolvedResource,
} from './resources/index.js';

// Result conversion
export {
  formatResult,
  isBinaryPayload,
  toToolResult,
  toToolError,
  toResourceResult,
  type BinaryPayload,
} from './content.js';
