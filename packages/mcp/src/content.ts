/**
 * Convert command results into MCP content.
 */

import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { isPlainObject } from '@hostbridge/utils/casing';

/** A result carrying base64 data, e.g. a screenshot */
export interface BinaryPayload {
  mime_type: string;
  data: string;
}

export function isBinaryPayload(value: unknown): value is BinaryPayload {
  return isPlainObject(value) && typeof value.mime_type === 'string' && typeof value.data === 'string';
}

export function formatResult(result: unknown): string {
  if (typeof result === 'string') return result;
  return JSON.stringify(result ?? null, null, 2);
}

export function toToolResult(result: unknown): CallToolResult {
  if (isBinaryPayload(result) && result.mime_type.startsWith('image/')) {
    return { content: [{ type: 'image', data: result.data, mimeType: result.mime_type }] };
  }
  return { content: [{ type: 'text', text: formatResult(result) }] };
}

export function toToolError(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export function toResourceResult(uri: string, result: unknown): ReadResourceResult {
  if (isBinaryPayload(result)) {
    return { contents: [{ uri, mimeType: result.mime_type, blob: result.data }] };
  }
  if (typeof result === 'string') {
    return { contents: [{ uri, mimeType: 'text/plain', text: result }] };
  }
  return { contents: [{ uri, mimeType: 'application/json', text: formatResult(result) }] };
}
