/**
 * Caches the host's get_schema result so tools/list and resources/* calls do
 * not each cost a round trip. Entries expire after `ttlMs`.
 */

import type { HostSchema } from '@hostbridge/sdk';
import { ensureConnected, type HostClient } from './client.js';

export const DEFAULT_SCHEMA_TTL_MS = 30_000;

export class SchemaCache {
  private schema?: HostSchema;
  private fetchedAt = 0;
  private inflight?: Promise<HostSchema>;

  constructor(
    private readonly client: HostClient,
    private readonly ttlMs: number = DEFAULT_SCHEMA_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  async get(): Promise<HostSchema> {
    if (this.schema && this.now() - this.fetchedAt < this.ttlMs) {
      return this.schema;
    }
    // Concurrent callers share one fetch
    if (!this.inflight) {
      this.inflight = this.fetch().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.schema = undefined;
  }

  private async fetch(): Promise<HostSchema> {
    await ensureConnected(this.client);
    const schema = await this.client.getSchema();
    this.schema = schema;
    this.fetchedAt = this.now();
    return schema;
  }
}
