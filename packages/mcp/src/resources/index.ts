/**
 * MCP resources backed by the host's access_resource command.
 *
 * A resource's urlPattern may hold `{name}` segments, e.g.
 * `scene://objects/{object_id}`. Patterns without segments are listed as
 * plain resources, the rest as resource templates. Reading a URI fills the
 * segments (and any query string) into the resource's parameters.
 */

import type { ReadResourceResult, Resource, ResourceTemplate } from '@modelcontextprotocol/sdk/types.js';
import type { HostSchema, ResourceInfo } from '@hostbridge/sdk';
import { UnknownResourceError } from '@hostbridge/utils/errors';
import { ensureConnected, type HostClient } from '../client.js';
import { toResourceResult } from '../content.js';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface UriPattern {
  pattern: string;
  params: string[];
  regex: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compilePattern(pattern: string): UriPattern {
  const params: string[] = [];
  let source = '';
  let last = 0;
  for (const match of pattern.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    source += escapeRegExp(pattern.slice(last, index)) + '([^/?#]+)';
    params.push(match[1]);
    last = index + match[0].length;
  }
  source += escapeRegExp(pattern.slice(last));
  return { pattern, params, regex: new RegExp(`^${source}$`) };
}

export function isTemplate(pattern: string): boolean {
  return compilePattern(pattern).params.length > 0;
}

/**
 * Match a URI against a pattern. Returns the decoded segment values, or null.
 */
export function matchUri(pattern: string | UriPattern, uri: string): Record<string, string> | null {
  const compiled = typeof pattern === 'string' ? compilePattern(pattern) : pattern;
  const queryAt = uri.indexOf('?');
  const path = queryAt === -1 ? uri : uri.slice(0, queryAt);
  const match = compiled.regex.exec(path);
  if (!match) return null;

  const values: Record<string, string> = {};
  try {
    if (queryAt !== -1) {
      for (const [key, value] of new URLSearchParams(uri.slice(queryAt + 1))) {
        values[key] = value;
      }
    }
    compiled.params.forEach((name, i) => {
      values[name] = decodeURIComponent(match[i + 1]);
    });
  } catch {
    // Malformed percent-encoding
    return null;
  }
  return values;
}

function describe(info: ResourceInfo): string {
  return info.description || `Host resource: ${info.name}`;
}

function addressable(schema: HostSchema): ResourceInfo[] {
  return schema.resources.filter((info) => info.urlPattern.length > 0);
}

export function listResources(schema: HostSchema): Resource[] {
  return addressable(schema)
    .filter((info) => !isTemplate(info.urlPattern))
    .map((info) => ({
      uri: info.urlPattern,
      name: info.name,
      description: describe(info),
      mimeType: 'application/json',
    }));
}

export function listResourceTemplates(schema: HostSchema): ResourceTemplate[] {
  return addressable(schema)
    .filter((info) => isTemplate(info.urlPattern))
    .map((info) => ({
      uriTemplate: info.urlPattern,
      name: info.name,
      description: describe(info),
      mimeType: 'application/json',
    }));
}

export interface ResolvedResource {
  name: string;
  parameters: Record<string, string>;
}

/**
 * First resource whose pattern matches `uri`, in schema order.
 */
export function resolveResource(schema: HostSchema, uri: string): ResolvedResource | null {
  for (const info of addressable(schema)) {
    const parameters = matchUri(info.urlPattern, uri);
    if (parameters) return { name: info.name, parameters };
  }
  return null;
}

export async function readHostResource(
  client: HostClient,
  schema: HostSchema,
  uri: string
): Promise<ReadResourceResult> {
  const resolved = resolveResource(schema, uri);
  if (!resolved) {
    throw new UnknownResourceError(uri);
  }
  await ensureConnected(client);
  const result = await client.accessResource(resolved.name, resolved.parameters);
  return toResourceResult(uri, result);
}
