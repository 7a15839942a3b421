/**
 * Storage Factory
 *
 * Resolve a storage specification to a store instance.
 */

import { ConfigurationError } from '@tracegraph/protocol';
import { FileStore } from './file-store.js';
import { MemoryStore } from './memory-store.js';
import { SQLiteStore } from './sqlite-store.js';
import type { StorageSpec, TraceStorage } from './types.js';

/**
 * Create a store from `'memory'`, `'file://<dir>'`, `'sqlite://<path>'`,
 * or pass an existing store through.
 *
 * @throws ConfigurationError for unsupported specifications or unusable targets
 */
export function createStorage(spec: StorageSpec | string = 'memory'): TraceStorage {
  if (typeof spec !== 'string') {
    return spec;
  }

  if (spec === 'memory') {
    return new MemoryStore();
  }

  if (spec.startsWith('file://')) {
    const directory = spec.slice('file://'.length);
    if (!directory) {
      throw new ConfigurationError('file:// storage requires a directory path');
    }
    return new FileStore(directory);
  }

  if (spec.startsWith('sqlite://')) {
    const dbPath = spec.slice('sqlite://'.length);
    return new SQLiteStore({ path: dbPath || ':memory:' });
  }

  throw new ConfigurationError(
    `Unsupported storage value '${spec}'. Use 'memory', 'file://<path>', 'sqlite://<path>', or a TraceStorage instance.`
  );
}
