/**
 * Process-local trace store. Loads do not refresh recency, so the oldest
 * save is evicted once `maxItems` is reached.
 */

import { LRUCache } from 'lru-cache';
import type { TraceGraph } from '@tracegraph/protocol';
import type { TraceStorage } from './types.js';

export interface MemoryStoreConfig {
  /** Default 1000 */
  maxItems?: number;
  /** 0 disables expiry */
  ttlMs?: number;
}

export class MemoryStore implements TraceStorage {
  private readonly traces: LRUCache<string, TraceGraph>;

  constructor(config: MemoryStoreConfig = {}) {
    const ttlMs = config.ttlMs ?? 0;

    this.traces = new LRUCache<string, TraceGraph>({
      max: config.maxItems ?? 1000,
      ...(ttlMs > 0 ? { ttl: ttlMs } : {}),
    });
  }

  async save(trace: TraceGraph): Promise<void> {
    this.traces.set(trace.trace_id, trace);
  }

  async load(traceId: string): Promise<TraceGraph | null> {
    // peek keeps save order intact for listTraces
    return this.traces.peek(traceId) ?? null;
  }

  async listTraces(): Promise<string[]> {
    return [...this.traces.rkeys()];
  }

  async delete(traceId: string): Promise<boolean> {
    return this.traces.delete(traceId);
  }

  get size(): number {
    return this.traces.size;
  }

  async close(): Promise<void> {
    this.traces.clear();
  }
}
