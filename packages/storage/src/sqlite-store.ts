/**
 * SQLite-backed trace store. One row per trace holding the serialized graph.
 */

import Database from 'better-sqlite3';
import { ConfigurationError, StorageError, traceFromJson, traceToJson } from '@tracegraph/protocol';
import type { DeserializeOptions, TraceGraph } from '@tracegraph/protocol';
import type { TraceStorage } from './types.js';

export interface SQLiteStoreConfig {
  /** Defaults to ':memory:' */
  path?: string;
  /** journal_mode = WAL */
  walMode?: boolean;

  /** Options passed to the deserializer on load */
  load?: DeserializeOptions;
}

interface TraceRow {
  payload: string;
}

interface TraceIdRow {
  trace_id: string;
}

export class SQLiteStore implements TraceStorage {
  private db: Database.Database | null = null;
  private readonly config: Required<Omit<SQLiteStoreConfig, 'load'>> & Pick<SQLiteStoreConfig, 'load'>;

  /**
   * @throws ConfigurationError when the database cannot be opened
   */
  constructor(config: SQLiteStoreConfig = {}) {
    this.config = {
      path: config.path ?? ':memory:',
      walMode: config.walMode ?? (config.path !== undefined && config.path !== ':memory:'),
      load: config.load,
    };

    try {
      this.db = new Database(this.config.path);
      if (this.config.walMode) {
        this.db.pragma('journal_mode = WAL');
      }

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS traces (
          trace_id TEXT PRIMARY KEY,
          name TEXT NOT NULL DEFAULT '',
          node_count INTEGER NOT NULL DEFAULT 0,
          start_time TEXT,
          end_time TEXT,
          payload TEXT NOT NULL,
          saved_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_traces_saved_at ON traces(saved_at);
      `);
    } catch (error) {
      throw new ConfigurationError(`Failed to open SQLite store at ${this.config.path}`, {
        cause: error,
      });
    }
  }

  private ensureOpen(): Database.Database {
    if (!this.db) {
      throw new StorageError('Store is closed');
    }
    return this.db;
  }

  async save(trace: TraceGraph): Promise<void> {
    try {
      const db = this.ensureOpen();
      db.prepare(`
        INSERT OR REPLACE INTO traces
        (trace_id, name, node_count, start_time, end_time, payload, saved_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        trace.trace_id,
        trace.name,
        trace.nodes.size,
        trace.start_time,
        trace.end_time,
        traceToJson(trace, { indent: 0 }),
        new Date().toISOString()
      );
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to save trace ${trace.trace_id}`, trace.trace_id, {
        cause: error,
      });
    }
  }

  async load(traceId: string): Promise<TraceGraph | null> {
    const db = this.ensureOpen();
    const row = db
      .prepare<[string], TraceRow>('SELECT payload FROM traces WHERE trace_id = ?')
      .get(traceId);

    return row ? traceFromJson(row.payload, this.config.load) : null;
  }

  async listTraces(): Promise<string[]> {
    const db = this.ensureOpen();
    return db
      .prepare<[], TraceIdRow>('SELECT trace_id FROM traces ORDER BY trace_id')
      .all()
      .map(row => row.trace_id);
  }

  async delete(traceId: string): Promise<boolean> {
    const db = this.ensureOpen();
    const result = db.prepare('DELETE FROM traces WHERE trace_id = ?').run(traceId);
    return result.changes > 0;
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
