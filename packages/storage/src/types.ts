/**
 * Storage Types
 *
 * Contract between the tracer and its persistence collaborators.
 */

import type { TraceGraph } from '@tracegraph/protocol';

/**
 * Persistence backend for finished traces
 */
export interface TraceStorage {
  /** Persist a finished trace; rejects with a StorageError on write failure */
  save(trace: TraceGraph): Promise<void>;

  /** Load a trace by ID, or null if unknown */
  load(traceId: string): Promise<TraceGraph | null>;

  /** IDs of all known traces */
  listTraces(): Promise<string[]>;

  /** Release underlying resources */
  close?(): Promise<void>;
}

/**
 * Storage specification accepted by createStorage
 */
export type StorageSpec = TraceStorage | 'memory' | `file://${string}` | `sqlite://${string}`;
