import { describe, it, expect, vi } from 'vitest';
import { SchemaCache } from '../src/schema-cache.js';
import { SCHEMA, createMockClient } from './mock-client.js';

describe('SchemaCache', () => {
  it('reuses a schema until it expires', async () => {
    let now = 0;
    const client = createMockClient();
    const cache = new SchemaCache(client, 1000, () => now);

    expect(await cache.get()).toBe(SCHEMA);
    now = 999;
    await cache.get();
    expect(client.getSchema).toHaveBeenCalledTimes(1);

    now = 1000;
    await cache.get();
    expect(client.getSchema).toHaveBeenCalledTimes(2);
  });

  it('shares one fetch between concurrent callers', async () => {
    const client = createMockClient();
    const cache = new SchemaCache(client);

    const [a, b] = await Promise.all([cache.get(), cache.get()]);

    expect(a).toBe(SCHEMA);
    expect(b).toBe(SCHEMA);
    expect(client.getSchema).toHaveBeenCalledTimes(1);
  });

  it('fetches again after invalidate', async () => {
    const client = createMockClient();
    const cache = new SchemaCache(client);

    await cache.get();
    cache.invalidate();
    await cache.get();

    expect(client.getSchema).toHaveBeenCalledTimes(2);
  });

  it('does not cache failures', async () => {
    const client = createMockClient({
      getSchema: vi.fn().mockRejectedValueOnce(new Error('Timeout after 50ms: get_schema')).mockResolvedValue(SCHEMA),
    });
    const cache = new SchemaCache(client);

    await expect(cache.get()).rejects.toThrow('Timeout after 50ms: get_schema');
    expect(await cache.get()).toBe(SCHEMA);
  });

  it('connects before fetching', async () => {
    const client = createMockClient({ isConnected: false });
    const cache = new SchemaCache(client);

    await cache.get();

    expect(client.connect).toHaveBeenCalledTimes(1);
    expect(client.getSchema).toHaveBeenCalledTimes(1);
  });
});
