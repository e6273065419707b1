import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { HostClient } from '../src/client.js';
import {
  compilePattern,
  isTemplate,
  listResourceTemplates,
  listResources,
  matchUri,
  readHostResource,
  resolveResource,
} from '../src/resources/index.js';
import { SCHEMA, createMockClient } from './mock-client.js';

describe('URI patterns', () => {
  it('collects segment names in order', () => {
    expect(compilePattern('scene://objects/{object_id}/components/{component}').params).toEqual([
      'object_id',
      'component',
    ]);
  });

  it('tells templates from fixed URIs', () => {
    expect(isTemplate('scene://objects/{object_id}')).toBe(true);
    expect(isTemplate('hostbridge://host/info')).toBe(false);
  });

  it('extracts and decodes segment values', () => {
    expect(matchUri('scene://objects/{object_id}', 'scene://objects/cube%201')).toEqual({ object_id: 'cube 1' });
  });

  it('matches multiple segments', () => {
    expect(
      matchUri('scene://objects/{object_id}/components/{component}', 'scene://objects/cube/components/light')
    ).toEqual({ object_id: 'cube', component: 'light' });
  });

  it('rejects extra or empty segments', () => {
    expect(matchUri('scene://objects/{object_id}', 'scene://objects/cube/extra')).toBeNull();
    expect(matchUri('scene://objects/{object_id}', 'scene://objects/')).toBeNull();
  });

  it('treats pattern text literally', () => {
    expect(matchUri('host.info://x', 'hostXinfo://x')).toBeNull();
    expect(matchUri('host.info://x', 'host.info://x')).toEqual({});
  });

  it('adds query parameters, with segments taking precedence', () => {
    expect(matchUri('scene://stats', 'scene://stats?verbose=true')).toEqual({ verbose: 'true' });
    expect(matchUri('scene://objects/{object_id}', 'scene://objects/cube?object_id=other&depth=2')).toEqual({
      object_id: 'cube',
      depth: '2',
    });
  });

  it('does not match malformed percent-encoding', () => {
    expect(matchUri('scene://objects/{object_id}', 'scene://objects/%E0%A4%A')).toBeNull();
  });
});

describe('resource listing', () => {
  it('lists fixed URIs as resources', () => {
    expect(listResources(SCHEMA)).toEqual([
      {
        uri: 'hostbridge://host/info',
        name: 'host_info',
        description: 'Host details',
        mimeType: 'application/json',
      },
    ]);
  });

  it('lists patterns with segments as templates', () => {
    expect(listResourceTemplates(SCHEMA)).toEqual([
      {
        uriTemplate: 'scene://objects/{object_id}',
        name: 'object',
        description: 'Host resource: object',
        mimeType: 'application/json',
      },
    ]);
  });

  it('resolves a URI to a resource and its parameters', () => {
    expect(resolveResource(SCHEMA, 'scene://objects/cube')).toEqual({
      name: 'object',
      parameters: { object_id: 'cube' },
    });
    expect(resolveResource(SCHEMA, 'hostbridge://host/info')).toEqual({ name: 'host_info', parameters: {} });
    expect(resolveResource(SCHEMA, 'other://x')).toBeNull();
  });
});

describe('readHostResource', () => {
  let client: HostClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = createMockClient();
  });

  it('reads through access_resource and returns JSON', async () => {
    const value = { name: 'cube', position: [0, 1, 2] };
    vi.mocked(client.accessResource).mockResolvedValue(value);

    const result = await readHostResource(client, SCHEMA, 'scene://objects/cube');

    expect(client.accessResource).toHaveBeenCalledWith('object', { object_id: 'cube' });
    expect(result).toEqual({
      contents: [
        { uri: 'scene://objects/cube', mimeType: 'application/json', text: JSON.stringify(value, null, 2) },
      ],
    });
  });

  it('returns strings as plain text', async () => {
    vi.mocked(client.accessResource).mockResolvedValue('host-1');

    expect(await readHostResource(client, SCHEMA, 'hostbridge://host/info')).toEqual({
      contents: [{ uri: 'hostbridge://host/info', mimeType: 'text/plain', text: 'host-1' }],
    });
  });

  it('returns binary payloads as blobs', async () => {
    vi.mocked(client.accessResource).mockResolvedValue({ mime_type: 'image/png', data: 'aGVsbG8=' });

    expect(await readHostResource(client, SCHEMA, 'scene://objects/camera')).toEqual({
      contents: [{ uri: 'scene://objects/camera', mimeType: 'image/png', blob: 'aGVsbG8=' }],
    });
  });

  it('rejects unknown URIs without calling the host', async () => {
    await expect(readHostResource(client, SCHEMA, 'other://x')).rejects.toThrow('Unknown resource: other://x');
    expect(client.accessResource).not.toHaveBeenCalled();
  });
});
