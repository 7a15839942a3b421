/**
 * tracegraph Storage Package
 *
 * Persistence collaborators for finished traces.
 * Supports multiple backends: in-memory, JSON files, SQLite.
 */

export type { TraceStorage, StorageSpec } from './types.js';

// Store implementations
export { MemoryStore, type MemoryStoreConfig } from './memory-store.js';
export { FileStore, type FileStoreConfig } from './file-store.js';
export { SQLiteStore, type SQLiteStoreConfig } from './sqlite-store.js';

// File helpers
export { saveTraceFile, loadTraceFile } from './trace-file.js';

// Factory
export { createStorage } from './factory.js';
